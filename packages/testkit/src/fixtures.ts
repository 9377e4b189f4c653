/**
 * Ticket fixtures
 */

import type { TicketDraft } from "@ticketdesk/sdk";

/**
 * Build a valid draft; names are lowercase so tests see canonicalisation at work
 */
export function makeDraft(overrides: Partial<TicketDraft> = {}): TicketDraft {
  return {
    firstName: "john",
    lastName: "o doe",
    grade: 10,
    gradeCategory: "b",
    ...overrides,
  };
}
