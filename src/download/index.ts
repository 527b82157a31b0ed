export * from "./linkScanner";
export * from "./integrity";
export * from "./downloader";
