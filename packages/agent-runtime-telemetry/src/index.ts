/**
 * Agent Runtime Telemetry
 *
 * Structured logging shared by every runtime package.
 */

export * from "./logging";
