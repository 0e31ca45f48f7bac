export * from "./random";
export * from "./bootstrap";
