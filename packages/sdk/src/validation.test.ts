import { describe, it, expect } from "vitest";
import { formatName, formatEntry, isCorrupted, assertNotCorrupted } from "./validation.js";
import { TICKET_ENTRY_TAG, type TicketDraft } from "./types.js";
import { U32_MAX } from "./checked.js";
import {
  CorruptedTableEntryError,
  CorruptedTableError,
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

describe("formatName", () => {
  it("should capitalize each word", () => {
    expect(formatName("john")).toBe("John");
    expect(formatName("o doe")).toBe("O Doe");
    expect(formatName("MARY-ANN")).toBe("Mary-Ann");
    expect(formatName("mCdOnAlD")).toBe("Mcdonald");
  });

  it("should collapse runs of separators into the first one", () => {
    expect(formatName("anna  maria")).toBe("Anna Maria");
    expect(formatName("mary--ann")).toBe("Mary-Ann");
    expect(formatName("jean - luc")).toBe("Jean Luc");
    expect(formatName("jean- luc")).toBe("Jean-Luc");
  });

  it("should drop leading and trailing separators", () => {
    expect(formatName("  anna ")).toBe("Anna");
    expect(formatName("-x-")).toBe("X");
    expect(formatName("---")).toBe("");
    expect(formatName("")).toBe("");
  });

  it("should reject characters other than letters, spaces and dashes", () => {
    expect(() => formatName("j0hn")).toThrow(InvalidStringError);
    expect(() => formatName("o'doe")).toThrow(InvalidStringError);
    expect(() => formatName("José")).toThrow(InvalidStringError);
    expect(() => formatName("tab\tname")).toThrow(InvalidStringError);
  });

  it("should be idempotent", () => {
    const inputs = ["john", "o doe", " MARY--ann ", "a-b c", "x", "--- a  - b ---", "zZ zZ"];
    for (const input of inputs) {
      const once = formatName(input);
      expect(formatName(once)).toBe(once);
    }
  });
});

describe("formatEntry", () => {
  it("should normalize names and grade category", () => {
    const formatted = formatEntry(draft());

    expect(formatted).toEqual({
      metadata: { flags: 0, scanCount: 0, lastScanDate: "" },
      firstName: "John",
      lastName: "O Doe",
      grade: 10,
      gradeCategory: "B",
    });
  });

  it("should not modify the draft", () => {
    const input = draft();
    formatEntry(input);
    expect(input.firstName).toBe("john");
    expect(input.gradeCategory).toBe("b");
  });

  it("should be idempotent", () => {
    const once = formatEntry(draft({ firstName: " ana-MARIA ", gradeCategory: "f" }));
    expect(formatEntry(once)).toEqual(once);
  });

  it("should accept grades 9 to 12", () => {
    for (const grade of [9, 10, 11, 12]) {
      expect(formatEntry(draft({ grade })).grade).toBe(grade);
    }
  });

  it("should reject grades outside 9 to 12", () => {
    expect(() => formatEntry(draft({ grade: 8 }))).toThrow(InvalidEntryFieldError);
    expect(() => formatEntry(draft({ grade: 13 }))).toThrow(InvalidEntryFieldError);
    expect(() => formatEntry(draft({ grade: 10.5 }))).toThrow(InvalidEntryFieldError);
  });

  it("should reject grade categories outside A to F", () => {
    expect(() => formatEntry(draft({ gradeCategory: "g" }))).toThrow(InvalidEntryFieldError);
    expect(() => formatEntry(draft({ gradeCategory: "1" }))).toThrow(InvalidEntryFieldError);
    expect(() => formatEntry(draft({ gradeCategory: "" }))).toThrow(InvalidEntryFieldError);
    expect(() => formatEntry(draft({ gradeCategory: "AB" }))).toThrow(InvalidEntryFieldError);
  });

  it("should reject invalid names", () => {
    expect(() => formatEntry(draft({ lastName: "d0e" }))).toThrow(InvalidStringError);
  });

  it("should keep provided metadata", () => {
    const formatted = formatEntry(
      draft({ metadata: { flags: 1, scanCount: 4, lastScanDate: "7/3/2024-9:5:0" } })
    );
    expect(formatted.metadata).toEqual({ flags: 1, scanCount: 4, lastScanDate: "7/3/2024-9:5:0" });
  });

  it("should reject metadata outside u32", () => {
    expect(() => formatEntry(draft({ metadata: { scanCount: -1 } }))).toThrow(
      InvalidEntryFieldError
    );
    expect(() => formatEntry(draft({ metadata: { flags: U32_MAX + 1 } }))).toThrow(
      InvalidEntryFieldError
    );
  });
});

describe("corruption tag", () => {
  it("should detect a mismatched tag", () => {
    expect(isCorrupted({ tag: TICKET_ENTRY_TAG })).toBe(false);
    expect(isCorrupted({ tag: 0 })).toBe(true);
  });

  it("should throw the error matching the scope", () => {
    expect(() => assertNotCorrupted({ tag: TICKET_ENTRY_TAG }, 1n)).not.toThrow();
    expect(() => assertNotCorrupted({ tag: 0 }, 1n)).toThrow(CorruptedTableEntryError);
    expect(() => assertNotCorrupted({ tag: 0 }, 1n, "table")).toThrow(CorruptedTableError);
  });
});
