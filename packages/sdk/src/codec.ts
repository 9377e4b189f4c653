/**
 * YAML table document codec
 *
 * Document shape (field names, base-36 IDs, plain integer grades and the "N/A" scan
 * date sentinel are the file contract):
 *
 * ```yaml
 * info:
 *   name: Spring Ball
 *   tickets: 1
 * entries:
 *   - ticket_id: 4F2K1
 *     first_name: John
 *     last_name: O Doe
 *     grade: 10
 *     grade_category: B
 *     metadata:
 *       flags: 0
 *       scan_count: 0
 *       last_scan_date: N/A
 * ```
 */

import { isMap, isScalar, isSeq, parseDocument, stringify, type Document } from "yaml";
import { z } from "zod";
import type { TableOptions, TicketDraft } from "./types.js";
import { U32_MAX } from "./checked.js";
import { CorruptedTableError, InvalidYamlError } from "./errors.js";
import { createTable, type TicketTable } from "./table.js";
import { decodeTicketId, encodeTicketId } from "./ticket-id.js";

/**
 * Value written for last_scan_date when a ticket was never scanned
 */
export const NO_SCAN_DATE = "N/A";

const U32Schema = z.number().int().min(0).max(U32_MAX);

const MetadataNodeSchema = z.object({
  flags: U32Schema,
  scan_count: U32Schema,
  last_scan_date: z.string(),
});

const EntryNodeSchema = z.object({
  ticket_id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  grade: z.number().int().min(0),
  grade_category: z.string(),
  metadata: MetadataNodeSchema,
});

export const TableDocumentSchema = z.object({
  info: z.object({
    name: z.string(),
    tickets: z.number().int().min(0),
  }),
  entries: z.array(EntryNodeSchema),
});

export type EntryNode = z.infer<typeof EntryNodeSchema>;
export type TableDocument = z.infer<typeof TableDocumentSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

function toDraft(node: EntryNode): TicketDraft {
  const lastScanDate = node.metadata.last_scan_date;
  return {
    firstName: node.first_name,
    lastName: node.last_name,
    grade: node.grade,
    gradeCategory: node.grade_category,
    metadata: {
      flags: node.metadata.flags,
      scanCount: node.metadata.scan_count,
      lastScanDate: lastScanDate === NO_SCAN_DATE ? "" : lastScanDate,
    },
  };
}

/**
 * Put back the source text of ticket_id scalars the core schema resolved to numbers or
 * booleans; `ticket_id: 12345` and `ticket_id: 1E5` are base-36 text, not numbers.
 */
function keepTicketIdSource(document: Document.Parsed): void {
  const entries = document.get("entries");
  if (!isSeq(entries)) {
    return;
  }

  for (const item of entries.items) {
    if (!isMap(item)) {
      continue;
    }
    const node = item.get("ticket_id", true);
    if (
      isScalar(node) &&
      (typeof node.value === "number" || typeof node.value === "boolean") &&
      node.source !== undefined
    ) {
      node.value = node.source;
    }
  }
}

/**
 * Build the document for a table, entries in ascending ticket ID order
 * @throws {CorruptedTableError} If an entry is corrupted
 */
export function toTableDocument(table: TicketTable): TableDocument {
  const entries: EntryNode[] = [];

  table.forEach((id, entry) => {
    entries.push({
      ticket_id: encodeTicketId(id),
      first_name: entry.firstName,
      last_name: entry.lastName,
      grade: entry.grade,
      grade_category: entry.gradeCategory,
      metadata: {
        flags: entry.metadata.flags,
        scan_count: entry.metadata.scanCount,
        last_scan_date: entry.metadata.lastScanDate || NO_SCAN_DATE,
      },
    });
  });

  return {
    info: { name: table.name, tickets: table.count() },
    entries,
  };
}

/**
 * Serialize a table to YAML text
 * @throws {CorruptedTableError} If an entry is corrupted
 */
export function serializeTable(table: TicketTable): string {
  return stringify(toTableDocument(table));
}

/**
 * Rebuild a table from a parsed document
 *
 * Every entry goes through insertWithTicketId, so loaded data is held to the same rules
 * as live insertions. The header count is compared once all entries are in.
 *
 * @param options - Table options; `name` is taken from the document
 * @throws {InvalidParameterError | IntegerOverflowError} If a ticket_id does not decode
 * @throws Any error of TicketTable.insertWithTicketId
 * @throws {CorruptedTableError} If info.tickets differs from the number of tickets
 */
export function fromTableDocument(
  document: TableDocument,
  options: Omit<TableOptions, "name"> = {}
): TicketTable {
  const table = createTable({ ...options, name: document.info.name });

  for (const node of document.entries) {
    const id = decodeTicketId(node.ticket_id);
    table.insertWithTicketId(id, toDraft(node));
  }

  if (document.info.tickets !== table.count()) {
    throw new CorruptedTableError(
      `header declares ${document.info.tickets} tickets, found ${table.count()}`
    );
  }

  return table;
}

/**
 * Parse YAML text into a table
 * @throws {InvalidYamlError} If the text is not YAML or a required field is missing or mistyped
 * @throws Any error of fromTableDocument
 */
export function parseTable(text: string, options: Omit<TableOptions, "name"> = {}): TicketTable {
  const document = parseDocument(text);
  const [firstError] = document.errors;
  if (firstError !== undefined) {
    throw new InvalidYamlError(firstError.message, { cause: firstError });
  }
  keepTicketIdSource(document);

  let raw: unknown;
  try {
    raw = document.toJS();
  } catch (err) {
    throw new InvalidYamlError(err instanceof Error ? err.message : String(err), { cause: err });
  }

  const result = TableDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidYamlError(describeIssues(result.error), { cause: result.error });
  }

  return fromTableDocument(result.data, options);
}
