import { describe, it, expect } from "vitest";
import {
  checkedAddU64,
  checkedMultiplyU64,
  checkedIncrementU64,
  checkedIncrementU32,
  checkedTruncateU8,
  isU32,
  U32_MAX,
  U64_MAX,
} from "./checked.js";
import { IntegerOverflowError, InvalidParameterError } from "./errors.js";

describe("checked arithmetic", () => {
  describe("checkedAddU64", () => {
    it("should add within range", () => {
      expect(checkedAddU64(2n, 3n)).toBe(5n);
      expect(checkedAddU64(U64_MAX - 1n, 1n)).toBe(U64_MAX);
    });

    it("should throw on overflow", () => {
      expect(() => checkedAddU64(U64_MAX, 1n)).toThrow(IntegerOverflowError);
    });

    it("should reject negative operands", () => {
      expect(() => checkedAddU64(-1n, 1n)).toThrow(InvalidParameterError);
    });
  });

  describe("checkedMultiplyU64", () => {
    it("should short-circuit zero", () => {
      expect(checkedMultiplyU64(0n, U64_MAX)).toBe(0n);
      expect(checkedMultiplyU64(U64_MAX, 0n)).toBe(0n);
    });

    it("should multiply within range", () => {
      expect(checkedMultiplyU64(36n, 36n)).toBe(1296n);
    });

    it("should throw on overflow", () => {
      expect(() => checkedMultiplyU64(U64_MAX / 2n + 1n, 2n)).toThrow(IntegerOverflowError);
    });
  });

  describe("checkedIncrementU64", () => {
    it("should increment", () => {
      expect(checkedIncrementU64(1n)).toBe(2n);
    });

    it("should throw at the maximum", () => {
      expect(() => checkedIncrementU64(U64_MAX)).toThrow(IntegerOverflowError);
    });
  });

  describe("checkedIncrementU32", () => {
    it("should increment", () => {
      expect(checkedIncrementU32(0)).toBe(1);
      expect(checkedIncrementU32(U32_MAX - 1)).toBe(U32_MAX);
    });

    it("should throw at the maximum", () => {
      expect(() => checkedIncrementU32(U32_MAX)).toThrow(IntegerOverflowError);
    });

    it("should reject values that are not u32", () => {
      expect(() => checkedIncrementU32(1.5)).toThrow(InvalidParameterError);
      expect(() => checkedIncrementU32(-1)).toThrow(InvalidParameterError);
    });
  });

  describe("checkedTruncateU8", () => {
    it("should pass values up to 255", () => {
      expect(checkedTruncateU8(10)).toBe(10);
      expect(checkedTruncateU8(255)).toBe(255);
    });

    it("should throw above 255", () => {
      expect(() => checkedTruncateU8(256)).toThrow(IntegerOverflowError);
    });

    it("should reject negative values", () => {
      expect(() => checkedTruncateU8(-3)).toThrow(InvalidParameterError);
    });
  });

  describe("isU32", () => {
    it("should accept integers in range only", () => {
      expect(isU32(0)).toBe(true);
      expect(isU32(U32_MAX)).toBe(true);
      expect(isU32(U32_MAX + 1)).toBe(false);
      expect(isU32(-1)).toBe(false);
      expect(isU32(2.5)).toBe(false);
      expect(isU32("1")).toBe(false);
    });
  });
});
