export * from "./models";
export * from "./guards";
