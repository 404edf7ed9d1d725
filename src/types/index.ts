export * from "./logger";
export * from "./clients/http";
