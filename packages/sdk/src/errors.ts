/**
 * Error types for ticket table operations
 *
 * Invariants:
 * - Every error raised by the table, the codec, or the persistence layer is a TicketDeskError
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Errors are terminal for the call that raised them; nothing is retried internally
 */

export type TicketDeskErrorCode =
  | "ID_INVALID"
  | "ID_GENERATION_FAILED"
  | "ID_ALREADY_EXISTS"
  | "ID_NOT_FOUND"
  | "ID_EXPIRED"
  | "ID_NOT_SCANNABLE"
  | "ENTRY_ALREADY_EXISTS"
  | "INTEGER_OVERFLOW"
  | "INVALID_PARAMETER"
  | "INVALID_ENTRY_FIELD"
  | "INVALID_STRING"
  | "INVALID_FILEPATH"
  | "INVALID_YAML"
  | "CORRUPTED_TABLE"
  | "CORRUPTED_TABLE_ENTRY"
  | "UNKNOWN_ERROR";

/**
 * Base class for all ticket table errors
 */
export abstract class TicketDeskError extends Error {
  abstract readonly code: TicketDeskErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a ticket ID is the reserved invalid value
 */
export class IdInvalidError extends TicketDeskError {
  readonly code = "ID_INVALID";

  constructor(options?: ErrorOptions) {
    super("Ticket ID 0 is reserved and cannot be used", options);
  }
}

/**
 * Thrown when every generation attempt collided with an existing ticket
 */
export class IdGenerationFailedError extends TicketDeskError {
  readonly code = "ID_GENERATION_FAILED";

  constructor(
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(`Failed to generate a free ticket ID after ${attempts} attempts`, options);
  }
}

/**
 * Thrown when inserting under a ticket ID that is already taken
 */
export class IdAlreadyExistsError extends TicketDeskError {
  readonly code = "ID_ALREADY_EXISTS";

  constructor(
    public readonly ticketId: string,
    options?: ErrorOptions
  ) {
    super(`Ticket ID already exists: ${ticketId}`, options);
  }
}

/**
 * Thrown when a ticket ID is not present in the table
 */
export class IdNotFoundError extends TicketDeskError {
  readonly code = "ID_NOT_FOUND";

  constructor(
    public readonly ticketId: string,
    options?: ErrorOptions
  ) {
    super(`Ticket ID not found: ${ticketId}`, options);
  }
}

/**
 * Thrown when committing a generated ticket ID after the table has changed
 */
export class IdExpiredError extends TicketDeskError {
  readonly code = "ID_EXPIRED";

  constructor(
    public readonly ticketId: string,
    options?: ErrorOptions
  ) {
    super(`Generated ticket ID ${ticketId} has expired; generate a new one`, options);
  }
}

/**
 * Thrown when scanning a ticket whose scannable flag is cleared
 */
export class IdNotScannableError extends TicketDeskError {
  readonly code = "ID_NOT_SCANNABLE";

  constructor(
    public readonly ticketId: string,
    options?: ErrorOptions
  ) {
    super(`Ticket ${ticketId} is not scannable`, options);
  }
}

/**
 * Thrown when an entry for the same person and class already exists
 */
export class EntryAlreadyExistsError extends TicketDeskError {
  readonly code = "ENTRY_ALREADY_EXISTS";

  constructor(
    public readonly existingTicketId: string,
    options?: ErrorOptions
  ) {
    super(`An equivalent entry already exists under ticket ${existingTicketId}`, options);
  }
}

/**
 * Thrown when a checked integer operation would leave its width
 */
export class IntegerOverflowError extends TicketDeskError {
  readonly code = "INTEGER_OVERFLOW";

  constructor(operation: string, options?: ErrorOptions) {
    super(`Integer overflow in ${operation}`, options);
  }
}

export class InvalidParameterError extends TicketDeskError {
  readonly code = "INVALID_PARAMETER";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when an entry field (grade, grade category, metadata) is out of range
 */
export class InvalidEntryFieldError extends TicketDeskError {
  readonly code = "INVALID_ENTRY_FIELD";

  constructor(
    public readonly field: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid ${field}: ${reason}`, options);
  }
}

/**
 * Thrown when a name contains characters other than letters, spaces and dashes
 */
export class InvalidStringError extends TicketDeskError {
  readonly code = "INVALID_STRING";

  constructor(
    public readonly value: string,
    options?: ErrorOptions
  ) {
    super(`Invalid name "${value}": only letters, spaces and dashes are allowed`, options);
  }
}

export class InvalidFilepathError extends TicketDeskError {
  readonly code = "INVALID_FILEPATH";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Cannot access table file: ${filePath}`, options);
  }
}

/**
 * Thrown when a table document cannot be parsed or lacks a required field
 */
export class InvalidYamlError extends TicketDeskError {
  readonly code = "INVALID_YAML";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid table document: ${reason}`, options);
  }
}

/**
 * Thrown when a traversal reaches a corrupted entry or the table is inconsistent
 */
export class CorruptedTableError extends TicketDeskError {
  readonly code = "CORRUPTED_TABLE";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Corrupted table: ${reason}`, options);
  }
}

/**
 * Thrown when an operation touches an entry whose integrity tag mismatches
 */
export class CorruptedTableEntryError extends TicketDeskError {
  readonly code = "CORRUPTED_TABLE_ENTRY";

  constructor(
    public readonly ticketId: string,
    options?: ErrorOptions
  ) {
    super(`Corrupted table entry: ${ticketId}`, options);
  }
}

export class UnknownError extends TicketDeskError {
  readonly code = "UNKNOWN_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}
