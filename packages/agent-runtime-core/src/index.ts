/**
 * Agent Runtime Core
 *
 * Domain types, error taxonomy and configuration shared by the control and
 * persistence packages.
 */

export * from "./config";
export * from "./errors";
export { type Session, totalTokens } from "./session/types";
