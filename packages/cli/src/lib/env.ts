/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

export const DEFAULT_TABLE_PATH = "./tickets.yaml";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the table file path
 * Priority: CLI option > TICKETDESK_TABLE env var > default "./tickets.yaml"
 */
export function resolveTablePath(cliTable?: string): string {
  const table = cliTable ?? process.env.TICKETDESK_TABLE ?? DEFAULT_TABLE_PATH;
  return path.resolve(expandTilde(table));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.TICKETDESK_CLI_DEBUG === "1";
}
