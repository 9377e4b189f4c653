/**
 * Loading and saving tables to YAML files
 */

import * as path from "node:path";
import type { TableOptions } from "./types.js";
import type { TicketTable } from "./table.js";
import { parseTable, serializeTable } from "./codec.js";
import { atomicWrite, readTableFile } from "./io.js";
import { TicketDeskError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Load a table from a YAML file
 *
 * The table is rebuilt by replaying every entry through the normal insertion path; any
 * violation rejects the whole file.
 *
 * @param filePath - Table file path
 * @param options - Table options (the name comes from the file)
 * @throws {InvalidFilepathError} If the file cannot be read
 * @throws {InvalidYamlError} If the document is malformed
 * @throws {CorruptedTableError} If the header count does not match the entries
 * @throws Any insertion error for an invalid entry
 *
 * @example
 * ```typescript
 * const table = await loadTable("./tickets.yaml");
 * table.rescan(decodeTicketId("4F2K1"));
 * await saveTable(table, "./tickets.yaml");
 * ```
 */
export async function loadTable(
  filePath: string,
  options: Omit<TableOptions, "name"> = {}
): Promise<TicketTable> {
  const resolved = path.resolve(filePath);
  const text = await readTableFile(resolved);

  try {
    const table = parseTable(text, options);
    logger.debug("table.load", { path: resolved, details: { tickets: table.count() } });
    return table;
  } catch (err) {
    if (err instanceof TicketDeskError) {
      logger.warn("table.load_failed", { path: resolved, message: err.message });
    }
    throw err;
  }
}

/**
 * Save a table to a YAML file
 *
 * The document is fully serialized before the file is touched, so a corrupted table
 * leaves the previous file in place.
 *
 * @throws {CorruptedTableError} If an entry is corrupted
 * @throws {InvalidFilepathError} If the file cannot be written
 */
export async function saveTable(table: TicketTable, filePath: string): Promise<void> {
  const resolved = path.resolve(filePath);
  const text = serializeTable(table);
  await atomicWrite(resolved, text);
  logger.debug("table.save", { path: resolved, details: { tickets: table.count() } });
}
