/**
 * Upload HTTP Client
 */

export const VERSION = "0.1.0";

export * from "./types";
export * from "./config";
export * from "./builder";
export * from "./connector";
export * from "./http-client";
export * from "./trust-store-configurator";
export * from "./validation-bypass";
export * from "./factory";
