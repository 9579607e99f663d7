/**
 * Vitest alias configuration for workspace packages.
 *
 * Points each @tollgate package at its TypeScript sources so tests run
 * without a build.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export type AliasEntry = { find: string; replacement: string };

export const aliases: AliasEntry[] = [
  {
    find: "@tollgate/agent-runtime-core",
    replacement: path.resolve(__dirname, "packages/agent-runtime-core/src/index.ts"),
  },
  {
    find: "@tollgate/agent-runtime-control",
    replacement: path.resolve(__dirname, "packages/agent-runtime-control/src/index.ts"),
  },
  {
    find: "@tollgate/agent-runtime-persistence",
    replacement: path.resolve(__dirname, "packages/agent-runtime-persistence/src/index.ts"),
  },
  {
    find: "@tollgate/agent-runtime-telemetry",
    replacement: path.resolve(__dirname, "packages/agent-runtime-telemetry/src/index.ts"),
  },
];
