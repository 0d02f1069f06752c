export * from "./errors";
export * from "./fs";
export * from "./zip";
