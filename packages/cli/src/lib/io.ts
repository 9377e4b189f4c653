/**
 * I/O helpers for CLI
 */

import { createInterface } from "node:readline/promises";
import { CliError } from "./errors.js";

/**
 * Ask a yes/no question; resolves true only for "y"
 */
export type Confirm = (question: string) => Promise<boolean>;

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * Prompt on the terminal; outside a TTY there is nobody to ask
 */
export const promptConfirm: Confirm = async (question) => {
  if (!isStdinTTY()) {
    throw new CliError("Confirmation required; use --force in non-interactive mode", {
      exitCode: 1,
    });
  }

  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = (await rl.question(question)).trim().toLowerCase();
    return answer === "y";
  } finally {
    rl.close();
  }
};
