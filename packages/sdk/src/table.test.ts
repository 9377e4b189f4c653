import { describe, it, expect, beforeEach } from "vitest";
import { createTable, MAX_GENERATION_ATTEMPTS, type TicketTable } from "./table.js";
import { TicketFlag, TICKET_ENTRY_TAG, type RandomSource, type TicketDraft } from "./types.js";
import { encodeTicketId, TICKET_ID_MAX } from "./ticket-id.js";
import { U32_MAX } from "./checked.js";
import {
  CorruptedTableEntryError,
  CorruptedTableError,
  EntryAlreadyExistsError,
  IdAlreadyExistsError,
  IdExpiredError,
  IdGenerationFailedError,
  IdInvalidError,
  IdNotFoundError,
  IdNotScannableError,
  IntegerOverflowError,
  InvalidEntryFieldError,
  InvalidStringError,
} from "./errors.js";

const draft = (overrides: Partial<TicketDraft> = {}): TicketDraft => ({
  firstName: "john",
  lastName: "o doe",
  grade: 10,
  gradeCategory: "b",
  ...overrides,
});

/**
 * Letters-only name unique to each index ("a", "b", ..., "ba", ...)
 */
function nameFor(index: number): string {
  let name = "";
  let value = index;
  do {
    name = String.fromCharCode(97 + (value % 26)) + name;
    value = Math.floor(value / 26);
  } while (value > 0);
  return name;
}

/**
 * Random source replaying the given values in a loop
 */
function sequence(...values: bigint[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0n;
    index++;
    return value;
  };
}

describe("TicketTable", () => {
  let table: TicketTable;

  beforeEach(() => {
    table = createTable();
  });

  describe("insert()", () => {
    it("should normalize the entry and return a five-character ID", () => {
      // 10 * 36^4 draws the ID "A0001"
      const seeded = createTable({ random: () => 10n * 36n ** 4n });

      const id = seeded.insert(draft());

      expect(encodeTicketId(id)).toBe("A0001");
      expect(seeded.get(id)).toEqual({
        tag: TICKET_ENTRY_TAG,
        metadata: { flags: 0, scanCount: 0, lastScanDate: "" },
        firstName: "John",
        lastName: "O Doe",
        grade: 10,
        gradeCategory: "B",
      });
    });

    it("should generate 1000 distinct IDs in range", () => {
      const ids = new Set<bigint>();

      for (let i = 0; i < 1000; i++) {
        const id = table.insert(draft({ lastName: nameFor(i) }));
        expect(id).toBeGreaterThanOrEqual(1n);
        expect(id).toBeLessThanOrEqual(TICKET_ID_MAX);
        ids.add(id);
      }

      expect(ids.size).toBe(1000);
      expect(table.count()).toBe(1000);
    });

    it("should reject the same person in the same class after normalization", () => {
      const id = table.insert(draft());

      expect(() => table.insert(draft({ firstName: "JOHN", lastName: "o  doe " }))).toThrow(
        EntryAlreadyExistsError
      );
      expect(() => table.insert(draft({ firstName: "JOHN", lastName: "o  doe " }))).toThrow(
        encodeTicketId(id)
      );
    });

    it("should allow the same name in a different class", () => {
      table.insert(draft());
      table.insert(draft({ gradeCategory: "c" }));
      table.insert(draft({ grade: 11 }));

      expect(table.count()).toBe(3);
    });

    it("should leave the table unchanged when validation fails", () => {
      table.insertWithTicketId(1n, draft());
      const generationBefore = table.generation;

      expect(() => table.insertWithTicketId(99n, draft({ grade: 13 }))).toThrow(
        InvalidEntryFieldError
      );
      expect(() => table.insertWithTicketId(99n, draft({ firstName: "j0hn" }))).toThrow(
        InvalidStringError
      );

      expect(table.count()).toBe(1);
      expect(table.isTicketIdValid(99n)).toBe(false);
      expect(table.generation).toBe(generationBefore);
    });
  });

  describe("insertWithTicketId()", () => {
    it("should reject a taken ID and keep the first entry", () => {
      table.insertWithTicketId(42n, draft());

      expect(() =>
        table.insertWithTicketId(42n, draft({ firstName: "ana", lastName: "pop", grade: 9 }))
      ).toThrow(IdAlreadyExistsError);

      expect(table.get(42n).firstName).toBe("John");
      expect(table.get(42n).grade).toBe(10);
      expect(table.count()).toBe(1);
    });

    it("should report IdAlreadyExists before validating the entry", () => {
      table.insertWithTicketId(42n, draft());
      expect(() => table.insertWithTicketId(42n, draft({ grade: 99 }))).toThrow(
        IdAlreadyExistsError
      );
    });

    it("should reject the reserved ID 0", () => {
      expect(() => table.insertWithTicketId(0n, draft())).toThrow(IdInvalidError);
    });

    it("should reject a draft carrying a mismatched tag", () => {
      expect(() => table.insertWithTicketId(5n, { ...draft(), tag: 0 })).toThrow(
        CorruptedTableEntryError
      );
    });

    it("should check the draft tag before the reserved ID", () => {
      expect(() => table.insertWithTicketId(0n, { ...draft(), tag: 0 })).toThrow(
        CorruptedTableEntryError
      );
      expect(table.generation).toBe(1n);
    });

    it("should accept an entry read back from another table", () => {
      table.insertWithTicketId(5n, draft());
      const other = createTable();

      other.insertWithTicketId(7n, table.get(5n));

      expect(other.get(7n).lastName).toBe("O Doe");
    });

    it("should advance the generation counter", () => {
      expect(table.generation).toBe(1n);
      table.insertWithTicketId(5n, draft());
      expect(table.generation).toBe(2n);
    });
  });

  describe("generation and commit", () => {
    it("should advance the counter on generation and hand out the new value", () => {
      const candidate = table.generateTicketId();

      expect(candidate.generation).toBe(2n);
      expect(table.generation).toBe(2n);
      expect(table.isTicketIdValid(candidate.id)).toBe(false);
    });

    it("should commit a fresh candidate", () => {
      const candidate = table.generateTicketId();

      const id = table.commit(candidate, draft());

      expect(id).toBe(candidate.id);
      expect(table.get(id).firstName).toBe("John");
      expect(table.generation).toBe(3n);
    });

    it("should expire a candidate once another insertion happens", () => {
      const candidate = table.generateTicketId();
      table.insertWithTicketId(candidate.id + 1n, draft({ firstName: "ana" }));

      expect(table.hasGeneratedTicketIdExpired(candidate)).toBe(true);
      expect(() => table.commit(candidate, draft())).toThrow(IdExpiredError);
      expect(table.isTicketIdValid(candidate.id)).toBe(false);
    });

    it("should expire a candidate once another ID is generated", () => {
      const first = table.generateTicketId();
      const second = table.generateTicketId();

      expect(() => table.commit(first, draft())).toThrow(IdExpiredError);
      expect(table.commit(second, draft())).toBe(second.id);
    });

    it("should reject a candidate carrying ID 0", () => {
      expect(() => table.hasGeneratedTicketIdExpired({ id: 0n, generation: 1n })).toThrow(
        IdInvalidError
      );
    });

    it("should fail after exhausting every attempt on collisions", () => {
      const seeded = createTable({ random: sequence(41n) });
      const taken = seeded.insert(draft());
      expect(taken).toBe(42n);
      const generationBefore = seeded.generation;

      expect(() => seeded.generateTicketId()).toThrow(IdGenerationFailedError);
      expect(() => seeded.insert(draft({ firstName: "ana" }))).toThrow(
        `after ${MAX_GENERATION_ATTEMPTS} attempts`
      );
      expect(seeded.generation).toBe(generationBefore);
      expect(seeded.count()).toBe(1);
    });

    it("should retry past collisions", () => {
      const seeded = createTable({ random: sequence(41n, 41n, 41n, 99n) });
      seeded.insert(draft());

      const candidate = seeded.generateTicketId();

      expect(candidate.id).toBe(100n);
    });
  });

  describe("get()", () => {
    it("should throw IdNotFoundError for a missing ID", () => {
      expect(() => table.get(12345n)).toThrow(IdNotFoundError);
      expect(() => table.get(12345n)).toThrow("9IX");
    });

    it("should throw IdNotFoundError for IDs outside 64 bits", () => {
      expect(() => table.get(-1n)).toThrow(IdNotFoundError);
      expect(() => table.get(-1n)).toThrow("-1");
      expect(() => table.remove(-1n)).toThrow(IdNotFoundError);
      expect(() => table.rescan(-1n)).toThrow(IdNotFoundError);
      expect(() => table.purge(2n ** 64n)).toThrow(IdNotFoundError);
    });

    it("should refuse to return a corrupted entry", () => {
      table.insertWithTicketId(3n, draft());
      table.get(3n).tag = 0;

      expect(() => table.get(3n)).toThrow(CorruptedTableEntryError);
    });
  });

  describe("remove() and purge()", () => {
    it("should remove an entry", () => {
      table.insertWithTicketId(3n, draft());

      table.remove(3n);

      expect(table.count()).toBe(0);
      expect(() => table.remove(3n)).toThrow(IdNotFoundError);
    });

    it("should refuse to remove a corrupted entry but allow purging it", () => {
      table.insertWithTicketId(3n, draft());
      table.get(3n).tag = 0;

      expect(() => table.remove(3n)).toThrow(CorruptedTableEntryError);
      expect(table.count()).toBe(1);

      table.purge(3n);

      expect(table.count()).toBe(0);
      expect(() => table.purge(3n)).toThrow(IdNotFoundError);
    });
  });

  describe("rescan()", () => {
    it("should stamp the local date and count the scan", () => {
      const clocked = createTable({ clock: () => new Date(2024, 2, 7, 9, 5, 0) });
      clocked.insertWithTicketId(8n, draft());

      clocked.rescan(8n);
      clocked.rescan(8n);

      expect(clocked.get(8n).metadata).toEqual({
        flags: 0,
        scanCount: 2,
        lastScanDate: "7/3/2024-9:5:0",
      });
    });

    it("should refuse tickets that are not scannable", () => {
      table.insertWithTicketId(8n, draft({ metadata: { flags: TicketFlag.NotScannable } }));

      expect(() => table.rescan(8n)).toThrow(IdNotScannableError);
      expect(table.get(8n).metadata.scanCount).toBe(0);
      expect(table.get(8n).metadata.lastScanDate).toBe("");
    });

    it("should fail on scan count overflow without stamping the date", () => {
      table.insertWithTicketId(8n, draft({ metadata: { scanCount: U32_MAX } }));

      expect(() => table.rescan(8n)).toThrow(IntegerOverflowError);
      expect(table.get(8n).metadata).toEqual({ flags: 0, scanCount: U32_MAX, lastScanDate: "" });
    });

    it("should throw IdNotFoundError for a missing ID", () => {
      expect(() => table.rescan(8n)).toThrow(IdNotFoundError);
    });
  });

  describe("setScannable()", () => {
    it("should toggle the not-scannable flag only", () => {
      table.insertWithTicketId(8n, draft({ metadata: { flags: 0b100 } }));

      table.setScannable(8n, false);
      expect(table.get(8n).metadata.flags).toBe(0b101);

      table.setScannable(8n, true);
      expect(table.get(8n).metadata.flags).toBe(0b100);
      table.rescan(8n);
      expect(table.get(8n).metadata.scanCount).toBe(1);
    });

    it("should keep flags unsigned at the top bit", () => {
      table.insertWithTicketId(8n, draft({ metadata: { flags: 0x8000_0000 } }));

      table.setScannable(8n, false);

      expect(table.get(8n).metadata.flags).toBe(0x8000_0001);
    });
  });

  describe("update()", () => {
    it("should replace fields and keep ID and metadata", () => {
      const clocked = createTable({ clock: () => new Date(2024, 0, 2, 3, 4, 5) });
      clocked.insertWithTicketId(8n, draft());
      clocked.rescan(8n);
      const generationBefore = clocked.generation;

      clocked.update(8n, { firstName: "ana", lastName: "pop", grade: 12, gradeCategory: "f" });

      expect(clocked.get(8n)).toEqual({
        tag: TICKET_ENTRY_TAG,
        metadata: { flags: 0, scanCount: 1, lastScanDate: "2/1/2024-3:4:5" },
        firstName: "Ana",
        lastName: "Pop",
        grade: 12,
        gradeCategory: "F",
      });
      expect(clocked.generation).toBe(generationBefore);
    });

    it("should allow re-saving the same person", () => {
      table.insertWithTicketId(8n, draft());
      table.update(8n, draft({ firstName: "JOHN" }));
      expect(table.get(8n).firstName).toBe("John");
    });

    it("should reject a duplicate of another entry", () => {
      table.insertWithTicketId(8n, draft());
      table.insertWithTicketId(9n, draft({ firstName: "ana" }));

      expect(() => table.update(9n, draft())).toThrow(EntryAlreadyExistsError);
      expect(table.get(9n).firstName).toBe("Ana");
    });

    it("should leave the entry unchanged on invalid input", () => {
      table.insertWithTicketId(8n, draft());

      expect(() => table.update(8n, draft({ firstName: "ana", grade: 8 }))).toThrow(
        InvalidEntryFieldError
      );
      expect(table.get(8n).firstName).toBe("John");
    });
  });

  describe("forEach()", () => {
    beforeEach(() => {
      table.insertWithTicketId(30n, draft({ firstName: "c" }));
      table.insertWithTicketId(10n, draft({ firstName: "a" }));
      table.insertWithTicketId(20n, draft({ firstName: "b" }));
    });

    it("should visit entries in ascending ID order", () => {
      const visited: bigint[] = [];
      table.forEach((id) => {
        visited.push(id);
      });
      expect(visited).toEqual([10n, 20n, 30n]);
    });

    it("should stop when the visitor breaks", () => {
      const visited: bigint[] = [];
      table.forEach((id) => {
        visited.push(id);
        return id === 20n ? "break" : "continue";
      });
      expect(visited).toEqual([10n, 20n]);
    });

    it("should abort at the first corrupted entry", () => {
      table.get(20n).tag = 0;
      const visited: bigint[] = [];

      expect(() =>
        table.forEach((id) => {
          visited.push(id);
        })
      ).toThrow(CorruptedTableError);
      expect(visited).toEqual([10n]);
    });

    it("should be restartable", () => {
      let first = 0;
      let second = 0;
      table.forEach(() => {
        first++;
        return "break";
      });
      table.forEach(() => {
        second++;
      });
      expect(first).toBe(1);
      expect(second).toBe(3);
    });
  });

  describe("findByName()", () => {
    it("should return every match in ID order", () => {
      table.insertWithTicketId(20n, draft());
      table.insertWithTicketId(10n, draft({ grade: 11 }));
      table.insertWithTicketId(30n, draft({ firstName: "ana" }));

      expect(table.findByName("John", "O Doe")).toEqual([10n, 20n]);
    });

    it("should match case-sensitively", () => {
      table.insertWithTicketId(20n, draft());
      expect(table.findByName("john", "o doe")).toEqual([]);
    });

    it("should fail on a corrupted entry", () => {
      table.insertWithTicketId(20n, draft());
      table.get(20n).tag = 1;
      expect(() => table.findByName("John", "O Doe")).toThrow(CorruptedTableError);
    });
  });

  describe("stats()", () => {
    it("should aggregate tickets, scans and classes", () => {
      table.insertWithTicketId(1n, draft());
      table.insertWithTicketId(2n, draft({ firstName: "ana" }));
      table.insertWithTicketId(3n, draft({ firstName: "ion", grade: 9, gradeCategory: "a" }));
      table.insertWithTicketId(
        4n,
        draft({ firstName: "eva", metadata: { flags: TicketFlag.NotScannable } })
      );
      table.rescan(1n);
      table.rescan(1n);
      table.rescan(3n);

      expect(table.stats()).toEqual({
        tickets: 4,
        scanned: 2,
        scans: 3,
        notScannable: 1,
        classes: { "10B": 3, "9A": 1 },
      });
    });

    it("should report an empty table", () => {
      expect(table.stats()).toEqual({
        tickets: 0,
        scanned: 0,
        scans: 0,
        notScannable: 0,
        classes: {},
      });
    });
  });

  describe("count()", () => {
    it("should count corrupted entries too", () => {
      table.insertWithTicketId(1n, draft());
      table.get(1n).tag = 0;
      expect(table.count()).toBe(1);
    });
  });

  it("should expose the configured name", () => {
    expect(createTable({ name: "Spring Ball" }).name).toBe("Spring Ball");
    expect(table.name).toBe("ticketdesk");
  });
});
