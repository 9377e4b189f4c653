/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import {
  checkedTruncateU8,
  decodeTicketId,
  TicketDeskError,
  INVALID_TICKET_ID,
  type TicketId,
} from "@ticketdesk/sdk";

/**
 * Parse a grade argument; the range is checked by the table
 */
export function parseGrade(value: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("grade must be a whole number");
  }

  try {
    return checkedTruncateU8(Number.parseInt(trimmed, 10));
  } catch (err) {
    if (err instanceof TicketDeskError) {
      throw new InvalidArgumentError(`grade ${trimmed} is out of range`);
    }
    throw err;
  }
}

/**
 * Parse a grade category argument (a single letter, either case)
 */
export function parseGradeCategory(value: string): string {
  const trimmed = value.trim();

  if (!/^[A-Za-z]$/.test(trimmed)) {
    throw new InvalidArgumentError("grade category must be a single letter");
  }

  return trimmed;
}

/**
 * Parse a base-36 ticket ID argument
 */
export function parseTicketIdArg(value: string): TicketId {
  let id: TicketId;
  try {
    id = decodeTicketId(value.trim());
  } catch (err) {
    if (err instanceof TicketDeskError) {
      throw new InvalidArgumentError(`"${value}" is not a valid ticket ID`);
    }
    throw err;
  }

  if (id === INVALID_TICKET_ID) {
    throw new InvalidArgumentError("ticket ID 0 is reserved");
  }

  return id;
}
