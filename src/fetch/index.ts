export * from "./types";
export * from "./validation";
export * from "./httpTransport";
export * from "./browserTransport";
export * from "./fetcher";
