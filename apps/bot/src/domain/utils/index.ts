export * from "./time.js";
export * from "./mutex.js";
