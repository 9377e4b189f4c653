/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createTable, saveTable } from "@ticketdesk/sdk";
import type { TableOptions, TicketDraft, TicketTable } from "@ticketdesk/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "ticketdesk-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "ticketdesk-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a table file holding the given tickets into dir
 * @param dir - Directory for the file
 * @param tickets - Entries keyed by ticket ID
 * @param options - Table options (name defaults to "Test Event")
 * @returns Path of the written file
 */
export async function writeTableFile(
  dir: string,
  tickets: ReadonlyArray<readonly [bigint, TicketDraft]> = [],
  options: TableOptions = {}
): Promise<string> {
  const table: TicketTable = createTable({ name: "Test Event", ...options });
  for (const [id, draft] of tickets) {
    table.insertWithTicketId(id, draft);
  }

  const filePath = join(dir, "tickets.yaml");
  await saveTable(table, filePath);
  return filePath;
}
