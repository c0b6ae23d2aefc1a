export * from "./dtype";
export * from "./ids";
export * from "./logger";
export * from "./shape";
