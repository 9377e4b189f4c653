/**
 * Ticket table implementation
 */

import type {
  GeneratedTicketId,
  RandomSource,
  TableOptions,
  TableStats,
  TicketDraft,
  TicketEntry,
  TicketId,
  TicketVisitor,
} from "./types.js";
import { TICKET_ENTRY_TAG, TicketFlag } from "./types.js";
import { checkedIncrementU32, checkedIncrementU64, U64_MAX } from "./checked.js";
import { formatScanDate, systemClock } from "./clock.js";
import {
  CorruptedTableEntryError,
  EntryAlreadyExistsError,
  IdAlreadyExistsError,
  IdExpiredError,
  IdGenerationFailedError,
  IdInvalidError,
  IdNotFoundError,
  IdNotScannableError,
  InvalidParameterError,
} from "./errors.js";
import {
  cryptoRandom,
  drawInRange,
  encodeTicketId,
  INVALID_TICKET_ID,
  TICKET_ID_MAX,
  ticketIdLabel,
} from "./ticket-id.js";
import { assertNotCorrupted, formatEntry, isCorrupted, type FormattedEntry } from "./validation.js";
import { logger } from "./observability/logs.js";

/**
 * Attempts made to find a free ticket ID before giving up
 */
export const MAX_GENERATION_ATTEMPTS = 512;

export const DEFAULT_TABLE_NAME = "ticketdesk";

const compareTicketIds = (a: TicketId, b: TicketId): number => (a < b ? -1 : a > b ? 1 : 0);

function assertUsableTicketId(id: TicketId): void {
  if (id === INVALID_TICKET_ID) {
    throw new IdInvalidError();
  }
  if (id < 0n || id > U64_MAX) {
    throw new InvalidParameterError(`Ticket ID out of range: ${id}`);
  }
}

function isSamePerson(a: FormattedEntry, b: FormattedEntry): boolean {
  return (
    a.grade === b.grade &&
    a.gradeCategory === b.gradeCategory &&
    a.lastName === b.lastName &&
    a.firstName === b.firstName
  );
}

/**
 * In-memory ticket table keyed by ticket ID
 *
 * Every mutation validates before it changes anything, so a failed call leaves the table
 * as it was. Entries are checked for corruption on every access; traversals visit
 * entries in ascending ticket ID order.
 *
 * The generation counter starts at 1 and moves on every successful ID generation and
 * every successful insertion. A generated ID can only be committed while the counter
 * still matches the value it was generated under.
 *
 * @example
 * ```typescript
 * const table = createTable({ name: "Spring Ball" });
 *
 * const id = table.insert({ firstName: "john", lastName: "o doe", grade: 10, gradeCategory: "b" });
 * table.get(id); // { firstName: "John", lastName: "O Doe", grade: 10, gradeCategory: "B", ... }
 *
 * // Two-step insertion
 * const candidate = table.generateTicketId();
 * table.commit(candidate, { firstName: "Ana", lastName: "Pop", grade: 9, gradeCategory: "A" });
 * ```
 */
export class TicketTable {
  #entries = new Map<TicketId, TicketEntry>();
  #generation = 1n;
  readonly #name: string;
  readonly #random: RandomSource;
  readonly #clock: () => Date;

  constructor(options: TableOptions = {}) {
    this.#name = options.name ?? DEFAULT_TABLE_NAME;
    this.#random = options.random ?? cryptoRandom;
    this.#clock = options.clock ?? systemClock;
  }

  /**
   * Event name written in the file header
   */
  get name(): string {
    return this.#name;
  }

  /**
   * Current value of the generation counter
   */
  get generation(): bigint {
    return this.#generation;
  }

  /**
   * Check whether a ticket ID is present (corrupted entries included)
   */
  isTicketIdValid(id: TicketId): boolean {
    return this.#entries.has(id);
  }

  /**
   * Check whether the table changed since the candidate was generated
   * @throws {IdInvalidError} If the candidate carries the reserved ID 0
   */
  hasGeneratedTicketIdExpired(candidate: GeneratedTicketId): boolean {
    if (candidate.id === INVALID_TICKET_ID) {
      throw new IdInvalidError();
    }
    return candidate.generation !== this.#generation;
  }

  /**
   * Draw a free ticket ID in [1, 36^5] without reserving it
   *
   * Retries while the draw collides with an existing ticket, up to
   * MAX_GENERATION_ATTEMPTS times. On success the generation counter moves on and the
   * candidate records the new value.
   *
   * @throws {IdGenerationFailedError} If every attempt collided
   */
  generateTicketId(): GeneratedTicketId {
    for (let attempt = 0; attempt < MAX_GENERATION_ATTEMPTS; attempt++) {
      const id = drawInRange(1n, TICKET_ID_MAX, this.#random);
      if (this.#entries.has(id)) {
        continue;
      }

      this.#generation = checkedIncrementU64(this.#generation);
      return Object.freeze({ id, generation: this.#generation });
    }

    logger.warn("table.id_generation_exhausted", {
      details: { attempts: MAX_GENERATION_ATTEMPTS, tickets: this.#entries.size },
    });
    throw new IdGenerationFailedError(MAX_GENERATION_ATTEMPTS);
  }

  /**
   * Insert an entry under a previously generated ticket ID
   * @throws {IdExpiredError} If another insertion or generation happened since the candidate was generated
   * @throws Any error of insertWithTicketId
   */
  commit(candidate: GeneratedTicketId, draft: TicketDraft): TicketId {
    if (this.hasGeneratedTicketIdExpired(candidate)) {
      throw new IdExpiredError(ticketIdLabel(candidate.id));
    }
    this.insertWithTicketId(candidate.id, draft);
    return candidate.id;
  }

  /**
   * Generate a ticket ID and insert the entry under it
   * @returns The new ticket ID
   */
  insert(draft: TicketDraft): TicketId {
    const candidate = this.generateTicketId();
    return this.commit(candidate, draft);
  }

  /**
   * Insert an entry under an explicit ticket ID
   *
   * The draft is normalized (see formatEntry) before the duplicate check, so two drafts
   * that differ only in capitalization or spacing are the same person.
   *
   * @throws {CorruptedTableEntryError} If the draft carries a mismatched tag
   * @throws {IdInvalidError} If id is 0
   * @throws {IdAlreadyExistsError} If the ID is taken
   * @throws {InvalidEntryFieldError | InvalidStringError} If a field is invalid
   * @throws {EntryAlreadyExistsError} If the same person is already in the same class
   * @throws {CorruptedTableError} If the duplicate scan meets a corrupted entry
   */
  insertWithTicketId(id: TicketId, draft: TicketDraft): void {
    if (draft.tag !== undefined && isCorrupted({ tag: draft.tag })) {
      throw new CorruptedTableEntryError(ticketIdLabel(id));
    }
    assertUsableTicketId(id);
    if (this.#entries.has(id)) {
      throw new IdAlreadyExistsError(encodeTicketId(id));
    }

    const formatted = formatEntry(draft);
    this.#assertNoDuplicate(formatted);

    const nextGeneration = checkedIncrementU64(this.#generation);
    this.#entries.set(id, { tag: TICKET_ENTRY_TAG, ...formatted });
    this.#generation = nextGeneration;

    logger.debug("table.insert", { ticketId: encodeTicketId(id) });
  }

  /**
   * Get the live entry for a ticket
   *
   * The returned object is the stored entry, not a copy.
   *
   * @throws {IdNotFoundError}
   * @throws {CorruptedTableEntryError}
   */
  get(id: TicketId): TicketEntry {
    return this.#lookup(id);
  }

  /**
   * Remove a ticket
   * @throws {IdNotFoundError}
   * @throws {CorruptedTableEntryError} If the entry is corrupted (use purge)
   */
  remove(id: TicketId): void {
    this.#lookup(id);
    this.#entries.delete(id);
  }

  /**
   * Remove a ticket without reading its entry; the only way to drop a corrupted entry
   * @throws {IdNotFoundError}
   */
  purge(id: TicketId): void {
    if (!this.#entries.delete(id)) {
      throw new IdNotFoundError(ticketIdLabel(id));
    }
  }

  /**
   * Record a scan: stamp the current local date-time and increment the scan count
   * @throws {IdNotFoundError}
   * @throws {CorruptedTableEntryError}
   * @throws {IdNotScannableError} If the ticket's scannable flag is cleared
   * @throws {IntegerOverflowError} If the scan count would wrap
   */
  rescan(id: TicketId): void {
    const entry = this.#lookup(id);
    if ((entry.metadata.flags & TicketFlag.NotScannable) !== 0) {
      throw new IdNotScannableError(encodeTicketId(id));
    }

    const lastScanDate = formatScanDate(this.#clock());
    const scanCount = checkedIncrementU32(entry.metadata.scanCount);

    entry.metadata.lastScanDate = lastScanDate;
    entry.metadata.scanCount = scanCount;
  }

  /**
   * Replace names, grade and grade category of a ticket, keeping its ID and metadata
   *
   * Validation is the same as for insertion; the entry being replaced does not count as
   * a duplicate of itself.
   *
   * @throws {IdNotFoundError}
   * @throws {CorruptedTableEntryError}
   * @throws {InvalidEntryFieldError | InvalidStringError}
   * @throws {EntryAlreadyExistsError}
   */
  update(id: TicketId, draft: TicketDraft): void {
    const entry = this.#lookup(id);
    if (draft.tag !== undefined && isCorrupted({ tag: draft.tag })) {
      throw new CorruptedTableEntryError(encodeTicketId(id));
    }

    const formatted = formatEntry({ ...draft, metadata: entry.metadata });
    this.#assertNoDuplicate(formatted, id);

    entry.firstName = formatted.firstName;
    entry.lastName = formatted.lastName;
    entry.grade = formatted.grade;
    entry.gradeCategory = formatted.gradeCategory;
  }

  /**
   * Set or clear the scannable flag of a ticket
   * @throws {IdNotFoundError}
   * @throws {CorruptedTableEntryError}
   */
  setScannable(id: TicketId, scannable: boolean): void {
    const entry = this.#lookup(id);
    const flags = entry.metadata.flags;
    entry.metadata.flags = scannable
      ? (flags & ~TicketFlag.NotScannable) >>> 0
      : (flags | TicketFlag.NotScannable) >>> 0;
  }

  /**
   * Number of stored entries
   */
  count(): number {
    return this.#entries.size;
  }

  /**
   * Visit entries in ascending ticket ID order
   *
   * Corruption is detected lazily: the traversal stops with CorruptedTableError when it
   * reaches a corrupted entry, after the entries before it were visited.
   *
   * @throws {CorruptedTableError}
   */
  forEach(visitor: TicketVisitor): void {
    const ids = [...this.#entries.keys()].sort(compareTicketIds);

    for (const id of ids) {
      const entry = this.#entries.get(id);
      if (entry === undefined) {
        // Removed by the visitor
        continue;
      }

      assertNotCorrupted(entry, id, "table");
      if (visitor(id, entry) === "break") {
        break;
      }
    }
  }

  /**
   * Find tickets by exact, case-sensitive match on canonical names
   * @returns Matching ticket IDs in ascending order (possibly empty)
   * @throws {CorruptedTableError}
   */
  findByName(firstName: string, lastName: string): TicketId[] {
    const matches: TicketId[] = [];
    this.forEach((id, entry) => {
      if (entry.firstName === firstName && entry.lastName === lastName) {
        matches.push(id);
      }
    });
    return matches;
  }

  /**
   * Aggregate counts over the table
   * @throws {CorruptedTableError}
   */
  stats(): TableStats {
    const stats: TableStats = { tickets: 0, scanned: 0, scans: 0, notScannable: 0, classes: {} };

    this.forEach((_id, entry) => {
      stats.tickets++;
      stats.scans += entry.metadata.scanCount;
      if (entry.metadata.scanCount > 0) {
        stats.scanned++;
      }
      if ((entry.metadata.flags & TicketFlag.NotScannable) !== 0) {
        stats.notScannable++;
      }

      const className = `${entry.grade}${entry.gradeCategory}`;
      stats.classes[className] = (stats.classes[className] ?? 0) + 1;
    });

    return stats;
  }

  #lookup(id: TicketId): TicketEntry {
    const entry = this.#entries.get(id);
    if (entry === undefined) {
      throw new IdNotFoundError(ticketIdLabel(id));
    }
    assertNotCorrupted(entry, id);
    return entry;
  }

  #assertNoDuplicate(candidate: FormattedEntry, exceptId?: TicketId): void {
    for (const [id, existing] of this.#entries) {
      if (id === exceptId) {
        continue;
      }
      assertNotCorrupted(existing, id, "table");
      if (isSamePerson(existing, candidate)) {
        throw new EntryAlreadyExistsError(encodeTicketId(id));
      }
    }
  }
}

/**
 * Create an empty ticket table
 */
export function createTable(options?: TableOptions): TicketTable {
  return new TicketTable(options);
}
