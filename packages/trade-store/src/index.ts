export * from "./factory";
export * from "./load-table";
export * from "./local-source";
export * from "./normalize";
export * from "./parse";
export * from "./s3-source";
export * from "./tables";
export * from "./types";
