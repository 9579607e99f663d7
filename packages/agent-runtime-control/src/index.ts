/**
 * Agent Runtime Control
 *
 * Event broker and permission arbitration.
 */

export * from "./events";
export * from "./permissions";
