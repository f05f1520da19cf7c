/**
 * Trust decisions for the upload client: trust stores, trust managers,
 * TLS contexts and failure reporting.
 */

export * from "./errors";
export * from "./result";
export * from "./logger";
export * from "./error-reporter";
export * from "./trust-store";
export * from "./trust-manager";
export * from "./tls-context";
