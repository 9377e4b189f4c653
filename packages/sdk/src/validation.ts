/**
 * Entry validation and normalization
 */

import type { TicketDraft, TicketEntry, TicketId, TicketMetadata } from "./types.js";
import { TICKET_ENTRY_TAG } from "./types.js";
import { isU32 } from "./checked.js";
import {
  CorruptedTableEntryError,
  CorruptedTableError,
  InvalidEntryFieldError,
  InvalidStringError,
} from "./errors.js";
import { encodeTicketId } from "./ticket-id.js";
import { logger } from "./observability/logs.js";

export const GRADE_MIN = 9;
export const GRADE_MAX = 12;
export const GRADE_CATEGORY_MIN = "A";
export const GRADE_CATEGORY_MAX = "F";

/**
 * Valid name characters: ASCII letters, space, dash
 */
const VALID_NAME_PATTERN = /^[A-Za-z -]*$/;

const isSeparator = (character: string): boolean => character === " " || character === "-";

/**
 * An entry after formatting, before it is tagged and stored
 */
export type FormattedEntry = Omit<TicketEntry, "tag">;

/**
 * Normalize a name to canonical form
 *
 * Lower-cases everything, capitalizes the first letter after the start or a separator,
 * keeps only the first separator of a run and drops leading and trailing separators.
 * Idempotent: formatName(formatName(x)) === formatName(x).
 *
 * @throws {InvalidStringError} If the name has a character other than a letter, space or dash
 *
 * @example
 * ```typescript
 * formatName("o doe");      // "O Doe"
 * formatName("mary--ANN "); // "Mary-Ann"
 * ```
 */
export function formatName(name: string): string {
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new InvalidStringError(name);
  }

  let formatted = "";
  let atWordStart = true;

  for (const character of name.toLowerCase()) {
    if (isSeparator(character)) {
      atWordStart = true;
      if (formatted.length === 0 || isSeparator(formatted.charAt(formatted.length - 1))) {
        continue;
      }
      formatted += character;
      continue;
    }

    formatted += atWordStart ? character.toUpperCase() : character;
    atWordStart = false;
  }

  if (formatted.length > 0 && isSeparator(formatted.charAt(formatted.length - 1))) {
    formatted = formatted.slice(0, -1);
  }

  return formatted;
}

function formatGrade(grade: number): number {
  if (!Number.isInteger(grade) || grade < GRADE_MIN || grade > GRADE_MAX) {
    throw new InvalidEntryFieldError("grade", `${grade} is outside ${GRADE_MIN}-${GRADE_MAX}`);
  }
  return grade;
}

function formatGradeCategory(category: string): string {
  if (category.length !== 1) {
    throw new InvalidEntryFieldError(
      "grade category",
      `expected a single letter, got "${category}"`
    );
  }

  const upper = category.toUpperCase();
  if (upper.length !== 1 || upper < GRADE_CATEGORY_MIN || upper > GRADE_CATEGORY_MAX) {
    throw new InvalidEntryFieldError(
      "grade category",
      `"${category}" is outside ${GRADE_CATEGORY_MIN}-${GRADE_CATEGORY_MAX}`
    );
  }
  return upper;
}

function formatMetadata(metadata: Partial<TicketMetadata> | undefined): TicketMetadata {
  const flags = metadata?.flags ?? 0;
  const scanCount = metadata?.scanCount ?? 0;
  const lastScanDate = metadata?.lastScanDate ?? "";

  if (!isU32(flags)) {
    throw new InvalidEntryFieldError("flags", `${flags} is not an unsigned 32-bit integer`);
  }
  if (!isU32(scanCount)) {
    throw new InvalidEntryFieldError(
      "scan count",
      `${scanCount} is not an unsigned 32-bit integer`
    );
  }
  if (typeof lastScanDate !== "string") {
    throw new InvalidEntryFieldError("last scan date", "must be a string");
  }

  return { flags, scanCount, lastScanDate };
}

/**
 * Validate a draft and return its normalized copy; the draft itself is left untouched
 * @throws {InvalidEntryFieldError} If grade, grade category or metadata is out of range
 * @throws {InvalidStringError} If a name has invalid characters
 */
export function formatEntry(draft: TicketDraft): FormattedEntry {
  const grade = formatGrade(draft.grade);
  const gradeCategory = formatGradeCategory(draft.gradeCategory);
  const firstName = formatName(draft.firstName);
  const lastName = formatName(draft.lastName);

  return {
    metadata: formatMetadata(draft.metadata),
    firstName,
    lastName,
    grade,
    gradeCategory,
  };
}

export function isCorrupted(entry: Pick<TicketEntry, "tag">): boolean {
  return entry.tag !== TICKET_ENTRY_TAG;
}

/**
 * Fail if the entry's integrity tag mismatches
 *
 * `scope` selects the error: "entry" for operations on a single ticket, "table" for
 * traversals that stumble on the entry.
 *
 * @throws {CorruptedTableEntryError | CorruptedTableError}
 */
export function assertNotCorrupted(
  entry: Pick<TicketEntry, "tag">,
  id: TicketId,
  scope: "entry" | "table" = "entry"
): void {
  if (!isCorrupted(entry)) {
    return;
  }

  const ticketId = encodeTicketId(id);
  logger.warn("table.corruption_detected", { ticketId, details: { scope } });

  if (scope === "table") {
    throw new CorruptedTableError(`entry ${ticketId} has a mismatched integrity tag`);
  }
  throw new CorruptedTableEntryError(ticketId);
}
