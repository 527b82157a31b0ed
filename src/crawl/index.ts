export * from "./dates";
export * from "./containerStrategies";
export * from "./recordParser";
export * from "./crawler";
