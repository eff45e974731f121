export * from "./types";
export * from "./config";
export * from "./log";
export * from "./text";
export * from "./pattern";
export * from "./keywords";
export * from "./price";
export * from "./matcher";
export * from "./watchConfig";
