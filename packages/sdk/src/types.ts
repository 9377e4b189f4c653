/**
 * Core types for the ticket table
 */

/**
 * Unsigned 64-bit ticket identifier; 0n is reserved as "unset"
 */
export type TicketId = bigint;

/**
 * Source of uniformly distributed unsigned 64-bit values
 */
export type RandomSource = () => bigint;

/**
 * Bit flags stored in ticket metadata
 */
export const TicketFlag = {
  None: 0,
  NotScannable: 1 << 0,
} as const;

/**
 * Four-byte tag ("TKTE") every live entry carries; any other value marks the entry corrupted
 */
export const TICKET_ENTRY_TAG = 0x544b5445;

export interface TicketMetadata {
  /** Bit set of TicketFlag values (u32) */
  flags: number;
  /** Number of successful scans (u32) */
  scanCount: number;
  /** Local date-time of the last scan, "" if never scanned */
  lastScanDate: string;
}

/**
 * A ticket as stored in the table
 */
export interface TicketEntry {
  /** Integrity tag; must equal TICKET_ENTRY_TAG */
  tag: number;
  metadata: TicketMetadata;
  /** Canonical first name (e.g. "Mary-Ann") */
  firstName: string;
  /** Canonical last name (e.g. "O Doe") */
  lastName: string;
  /** School grade, 9 to 12 */
  grade: number;
  /** Class letter within the grade, "A" to "F" */
  gradeCategory: string;
}

/**
 * Input for inserting or replacing a ticket
 *
 * Names and grade category are normalized on insertion. A supplied tag is checked
 * against TICKET_ENTRY_TAG, so entries read back from the table can be re-inserted.
 */
export interface TicketDraft {
  firstName: string;
  lastName: string;
  grade: number;
  gradeCategory: string;
  metadata?: Partial<TicketMetadata>;
  tag?: number;
}

/**
 * Ticket ID produced by generation but not yet committed
 *
 * `generation` is the table's generation counter at the moment of generation; the
 * candidate is stale once the counter has moved on.
 */
export interface GeneratedTicketId {
  readonly id: TicketId;
  readonly generation: bigint;
}

/**
 * Return value of a traversal callback; nothing means "continue"
 */
export type IterationDecision = "continue" | "break";

export type TicketVisitor = (id: TicketId, entry: TicketEntry) => IterationDecision | void;

/**
 * Ticket table configuration
 */
export interface TableOptions {
  /** Event name written in the file header (default: "ticketdesk") */
  name?: string;
  /** Random source used for ticket ID generation (default: system CSPRNG) */
  random?: RandomSource;
  /** Clock used to stamp scans (default: current time) */
  clock?: () => Date;
}

/**
 * Aggregate numbers over the table
 */
export interface TableStats {
  /** Number of tickets */
  tickets: number;
  /** Tickets scanned at least once */
  scanned: number;
  /** Sum of all scan counts */
  scans: number;
  /** Tickets that cannot be scanned */
  notScannable: number;
  /** Ticket count per class, keyed like "10B" */
  classes: Record<string, number>;
}
