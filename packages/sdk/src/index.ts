/**
 * ticketdesk SDK
 *
 * Ticket table for event attendees with base-36 ticket IDs and YAML persistence
 */

// Re-export types
export type {
  TicketId,
  RandomSource,
  TicketMetadata,
  TicketEntry,
  TicketDraft,
  GeneratedTicketId,
  IterationDecision,
  TicketVisitor,
  TableOptions,
  TableStats,
} from "./types.js";
export { TicketFlag, TICKET_ENTRY_TAG } from "./types.js";

// Table
export { TicketTable, createTable, DEFAULT_TABLE_NAME, MAX_GENERATION_ATTEMPTS } from "./table.js";

// Ticket ID codec
export {
  encodeTicketId,
  decodeTicketId,
  drawInRange,
  cryptoRandom,
  INVALID_TICKET_ID,
  TICKET_ID_LENGTH,
  TICKET_ID_MAX,
} from "./ticket-id.js";
export {
  checkedAddU64,
  checkedMultiplyU64,
  checkedIncrementU64,
  checkedIncrementU32,
  checkedTruncateU8,
  isU32,
  U8_MAX,
  U32_MAX,
  U64_MAX,
} from "./checked.js";

// Validation
export {
  formatName,
  formatEntry,
  isCorrupted,
  assertNotCorrupted,
  GRADE_MIN,
  GRADE_MAX,
  GRADE_CATEGORY_MIN,
  GRADE_CATEGORY_MAX,
} from "./validation.js";
export type { FormattedEntry } from "./validation.js";

// Persistence
export type { TableDocument, EntryNode } from "./codec.js";
export {
  serializeTable,
  parseTable,
  toTableDocument,
  fromTableDocument,
  TableDocumentSchema,
  NO_SCAN_DATE,
} from "./codec.js";
export { loadTable, saveTable } from "./persistence.js";
export { atomicWrite, readTableFile, fileExists } from "./io.js";
export { formatScanDate } from "./clock.js";

// Logging
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Errors
export {
  TicketDeskError,
  IdInvalidError,
  IdGenerationFailedError,
  IdAlreadyExistsError,
  IdNotFoundError,
  IdExpiredError,
  IdNotScannableError,
  EntryAlreadyExistsError,
  IntegerOverflowError,
  InvalidParameterError,
  InvalidEntryFieldError,
  InvalidStringError,
  InvalidFilepathError,
  InvalidYamlError,
  CorruptedTableError,
  CorruptedTableEntryError,
  UnknownError,
} from "./errors.js";
export type { TicketDeskErrorCode } from "./errors.js";
