/**
 * Ticket command implementations
 *
 * Each command runs against an open table and returns the lines to print; loading and
 * saving the file is left to the caller.
 */

import {
  encodeTicketId,
  formatName,
  GRADE_MAX,
  GRADE_MIN,
  NO_SCAN_DATE,
  TicketFlag,
  type TicketDraft,
  type TicketEntry,
  type TicketId,
  type TicketTable,
} from "@ticketdesk/sdk";

const GRADE_CATEGORIES = ["A", "B", "C", "D", "E", "F"] as const;

export interface EmitOptions {
  /** Insert under this ID instead of generating one */
  ticketId?: TicketId;
  /** Create the ticket with scanning disabled */
  notScannable?: boolean;
}

export function className(entry: Pick<TicketEntry, "grade" | "gradeCategory">): string {
  return `${entry.grade}${entry.gradeCategory}`;
}

/**
 * Order class names by grade, then category ("9A" before "10A")
 */
export function compareClassNames(a: string, b: string): number {
  const byGrade = Number.parseInt(a, 10) - Number.parseInt(b, 10);
  if (byGrade !== 0) {
    return byGrade;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function isScannable(entry: TicketEntry): boolean {
  return (entry.metadata.flags & TicketFlag.NotScannable) === 0;
}

function displayName(entry: Pick<TicketEntry, "firstName" | "lastName">): string {
  return `${entry.lastName} ${entry.firstName}`;
}

/**
 * Render a ticket as indented key/value lines
 */
export function describeTicket(id: TicketId, entry: TicketEntry): string[] {
  return [
    `Ticket ${encodeTicketId(id)}`,
    `  Name:      ${displayName(entry)}`,
    `  Class:     ${className(entry)}`,
    `  Scans:     ${entry.metadata.scanCount}`,
    `  Last scan: ${entry.metadata.lastScanDate || NO_SCAN_DATE}`,
    `  Scannable: ${isScannable(entry) ? "yes" : "no"}`,
  ];
}

export function runEmit(table: TicketTable, draft: TicketDraft, options: EmitOptions = {}): string[] {
  const input: TicketDraft = options.notScannable
    ? { ...draft, metadata: { ...draft.metadata, flags: TicketFlag.NotScannable } }
    : draft;

  let id: TicketId;
  if (options.ticketId !== undefined) {
    table.insertWithTicketId(options.ticketId, input);
    id = options.ticketId;
  } else {
    id = table.insert(input);
  }

  const entry = table.get(id);
  return [`${encodeTicketId(id)}  ${displayName(entry)}  ${className(entry)}`];
}

export function runShow(table: TicketTable, id: TicketId): string[] {
  return describeTicket(id, table.get(id));
}

/**
 * Print the state before the scan, then record it
 */
export function runScan(table: TicketTable, id: TicketId): string[] {
  const entry = table.get(id);
  const previous =
    entry.metadata.scanCount === 0
      ? `Ticket ${encodeTicketId(id)} has not been scanned before`
      : `Ticket ${encodeTicketId(id)} was last scanned ${entry.metadata.lastScanDate} (${entry.metadata.scanCount} scans)`;

  table.rescan(id);

  return [previous, `Scanned ${encodeTicketId(id)}: ${displayName(entry)} ${className(entry)}`];
}

export function runRemove(table: TicketTable, id: TicketId): string[] {
  const lines = describeTicket(id, table.get(id));
  table.remove(id);
  return [`Removed:`, ...lines];
}

function editableFields(entry: TicketEntry): [string, string][] {
  return [
    ["last name", entry.lastName],
    ["first name", entry.firstName],
    ["grade", String(entry.grade)],
    ["grade category", entry.gradeCategory],
  ];
}

/**
 * Replace a ticket's fields and list what changed
 */
export function runChange(table: TicketTable, id: TicketId, draft: TicketDraft): string[] {
  const entry = table.get(id);
  const before = editableFields(entry);

  table.update(id, draft);

  const after = editableFields(entry);
  const changes: string[] = [];
  before.forEach(([field, value], index) => {
    const next = after[index]?.[1];
    if (next !== value) {
      changes.push(`  ${field}: ${value} -> ${next}`);
    }
  });

  if (changes.length === 0) {
    return [`Ticket ${encodeTicketId(id)} unchanged`];
  }
  return [`Updated ${encodeTicketId(id)}`, ...changes];
}

export function runSetScannable(table: TicketTable, id: TicketId, scannable: boolean): string[] {
  table.setScannable(id, scannable);
  return [`Ticket ${encodeTicketId(id)} is ${scannable ? "now scannable" : "no longer scannable"}`];
}

/**
 * Look tickets up by name; the arguments are canonicalised like stored names
 */
export function runFind(table: TicketTable, firstName: string, lastName: string): string[] {
  const ids = table.findByName(formatName(firstName), formatName(lastName));
  if (ids.length === 0) {
    return ["No tickets found"];
  }
  return ids.map((id) => {
    const entry = table.get(id);
    return `${encodeTicketId(id)}  ${displayName(entry)}  ${className(entry)}`;
  });
}

/**
 * Roster per class, grades 9 to 12 and categories A to F, followed by the class totals
 */
export function runPrint(table: TicketTable): string[] {
  const rosters = new Map<string, { id: TicketId; entry: TicketEntry }[]>();
  table.forEach((id, entry) => {
    const key = className(entry);
    const roster = rosters.get(key) ?? [];
    roster.push({ id, entry });
    rosters.set(key, roster);
  });

  const lines: string[] = [];
  const totals: string[] = [];

  for (let grade = GRADE_MIN; grade <= GRADE_MAX; grade++) {
    for (const category of GRADE_CATEGORIES) {
      const key = className({ grade, gradeCategory: category });
      const roster = rosters.get(key);
      if (roster === undefined) {
        continue;
      }

      roster.sort((a, b) => {
        const left = displayName(a.entry);
        const right = displayName(b.entry);
        return left < right ? -1 : left > right ? 1 : 0;
      });

      lines.push(`Class ${key}`);
      for (const { id, entry } of roster) {
        lines.push(`  ${encodeTicketId(id).padEnd(5)}  ${displayName(entry)}`);
      }
      totals.push(`  ${key}: ${roster.length}`);
    }
  }

  if (totals.length === 0) {
    return ["No tickets"];
  }
  return [...lines, "Totals", ...totals, `  All: ${table.count()}`];
}

export function runStats(table: TicketTable): string[] {
  const stats = table.stats();
  const classes = Object.entries(stats.classes)
    .sort(([a], [b]) => compareClassNames(a, b))
    .map(([key, count]) => `${key}=${count}`)
    .join(", ");

  return [
    `Event:         ${table.name}`,
    `Tickets:       ${stats.tickets}`,
    `Scanned:       ${stats.scanned}`,
    `Scans:         ${stats.scans}`,
    `Not scannable: ${stats.notScannable}`,
    `Classes:       ${classes || "none"}`,
  ];
}
