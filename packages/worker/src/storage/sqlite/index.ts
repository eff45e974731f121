export * from "./client";
export * from "./constants";
export * from "./types";
