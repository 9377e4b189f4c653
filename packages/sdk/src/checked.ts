/**
 * Checked unsigned arithmetic
 *
 * Ticket IDs and the generation counter are u64 values carried in bigints; scan counts
 * are u32 values carried in numbers. Every operation here throws IntegerOverflowError
 * instead of wrapping or losing precision.
 */

import { IntegerOverflowError, InvalidParameterError } from "./errors.js";

export const U8_MAX = 0xff;
export const U32_MAX = 0xffff_ffff;
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

function assertU64(value: bigint, label: string): void {
  if (value < 0n || value > U64_MAX) {
    throw new InvalidParameterError(`${label} is not an unsigned 64-bit value: ${value}`);
  }
}

export function isU32(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= U32_MAX;
}

export function checkedAddU64(a: bigint, b: bigint): bigint {
  assertU64(a, "left operand");
  assertU64(b, "right operand");
  if (U64_MAX - a < b) {
    throw new IntegerOverflowError(`${a} + ${b}`);
  }
  return a + b;
}

export function checkedMultiplyU64(a: bigint, b: bigint): bigint {
  assertU64(a, "left operand");
  assertU64(b, "right operand");
  if (a === 0n || b === 0n) {
    return 0n;
  }
  if (U64_MAX / a < b) {
    throw new IntegerOverflowError(`${a} * ${b}`);
  }
  return a * b;
}

export function checkedIncrementU64(value: bigint): bigint {
  return checkedAddU64(value, 1n);
}

export function checkedIncrementU32(value: number): number {
  if (!isU32(value)) {
    throw new InvalidParameterError(`Not an unsigned 32-bit value: ${value}`);
  }
  if (value === U32_MAX) {
    throw new IntegerOverflowError(`${value} + 1`);
  }
  return value + 1;
}

/**
 * Narrow a non-negative integer to u8
 */
export function checkedTruncateU8(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidParameterError(`Not an unsigned integer: ${value}`);
  }
  if (value > U8_MAX) {
    throw new IntegerOverflowError(`narrowing ${value} to 8 bits`);
  }
  return value;
}
