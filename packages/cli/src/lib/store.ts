/**
 * Table file adapter for CLI
 * Every command loads the file, runs one table operation and writes it back if it changed
 */

import {
  createTable,
  fileExists,
  loadTable,
  saveTable,
  type TableOptions,
  type TicketTable,
} from "@ticketdesk/sdk";
import { CliError } from "./errors.js";

export type TableAccess = "read" | "write";

/**
 * Options passed to every table the CLI opens (the name comes from the file)
 */
export type CliTableOptions = Omit<TableOptions, "name">;

/**
 * Create an empty table file
 * @throws {CliError} If the file exists and force is not set
 */
export async function initTableFile(
  filePath: string,
  options: { name?: string; force?: boolean } = {}
): Promise<TicketTable> {
  if (!options.force && (await fileExists(filePath))) {
    throw new CliError(`Table already exists: ${filePath} (use --force to overwrite)`);
  }

  const table = createTable({ name: options.name });
  await saveTable(table, filePath);
  return table;
}

/**
 * Run fn against the table stored at filePath
 *
 * With "write" access the table is saved after fn returns; a throwing fn leaves the file
 * untouched.
 */
export async function withTable<T>(
  filePath: string,
  access: TableAccess,
  fn: (table: TicketTable) => T | Promise<T>,
  options: CliTableOptions = {}
): Promise<T> {
  const table = await loadTable(filePath, options);
  const result = await fn(table);

  if (access === "write") {
    await saveTable(table, filePath);
  }

  return result;
}
