export * from "./base";
export * from "./ndarray";
export * from "./storage";
export * from "./tensor";
