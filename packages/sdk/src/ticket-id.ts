/**
 * Ticket ID codec and random draw
 *
 * A ticket ID is an unsigned 64-bit integer written as base-36 text (0-9 then A-Z,
 * most significant digit first). Generated IDs use five digits, so they lie in
 * [1, 36^5]; decoding accepts any text whose value fits in 64 bits.
 */

import { randomBytes } from "node:crypto";
import type { RandomSource, TicketId } from "./types.js";
import { checkedAddU64, checkedMultiplyU64, U64_MAX } from "./checked.js";
import { InvalidParameterError } from "./errors.js";

const DIGITS = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const BASE = 36n;
const BASE36_CHARACTER = /^[0-9A-Za-z]$/;

/**
 * Reserved "unset" ticket ID
 */
export const INVALID_TICKET_ID: TicketId = 0n;

/**
 * Number of base-36 characters in a generated ticket ID
 */
export const TICKET_ID_LENGTH = 5;

/**
 * Upper bound (inclusive) of generated ticket IDs: 36^5
 */
export const TICKET_ID_MAX: TicketId = BASE ** BigInt(TICKET_ID_LENGTH);

/**
 * Encode a ticket ID as minimal base-36 text
 * @throws {InvalidParameterError} If the value is outside the unsigned 64-bit range
 *
 * @example
 * ```typescript
 * encodeTicketId(0n);        // "0"
 * encodeTicketId(60466175n); // "ZZZZZ"
 * ```
 */
export function encodeTicketId(id: TicketId): string {
  if (id < 0n || id > U64_MAX) {
    throw new InvalidParameterError(`Ticket ID out of range: ${id}`);
  }
  if (id === 0n) {
    return "0";
  }

  let value = id;
  let text = "";
  while (value !== 0n) {
    text = DIGITS.charAt(Number(value % BASE)) + text;
    value /= BASE;
  }
  return text;
}

/**
 * Text for a ticket ID in messages: base-36 when it fits in 64 bits, decimal otherwise
 */
export function ticketIdLabel(id: TicketId): string {
  return id < 0n || id > U64_MAX ? String(id) : encodeTicketId(id);
}

/**
 * Decode base-36 text (case-insensitive) into a ticket ID
 * @throws {InvalidParameterError} If the text is empty or has a non base-36 character
 * @throws {IntegerOverflowError} If the value does not fit in 64 bits
 */
export function decodeTicketId(text: string): TicketId {
  if (text.length === 0) {
    throw new InvalidParameterError("Ticket ID must be a non-empty string");
  }

  let result = 0n;
  for (const character of text) {
    // Checked before upper-casing: "ß" upper-cases to "SS" and "ı" to "I"
    const digit = BASE36_CHARACTER.test(character) ? DIGITS.indexOf(character.toUpperCase()) : -1;
    if (digit === -1) {
      throw new InvalidParameterError(
        `Ticket ID contains invalid character "${character}": "${text}"`
      );
    }
    result = checkedMultiplyU64(result, BASE);
    result = checkedAddU64(result, BigInt(digit));
  }
  return result;
}

/**
 * Default random source: 64 uniformly distributed bits from the system CSPRNG
 */
export const cryptoRandom: RandomSource = () => randomBytes(8).readBigUInt64BE();

/**
 * Draw a value in [closedMin, closedMax] by reducing a 64-bit draw modulo the range size.
 * The range 36^5 does not divide 2^64, so low values are very slightly favoured.
 * @throws {InvalidParameterError} If closedMin > closedMax
 */
export function drawInRange(closedMin: bigint, closedMax: bigint, random: RandomSource): bigint {
  if (closedMin > closedMax) {
    throw new InvalidParameterError(`Empty range [${closedMin}, ${closedMax}]`);
  }
  const draw = random();
  if (draw < 0n || draw > U64_MAX) {
    throw new InvalidParameterError(`Random source produced a value outside 64 bits: ${draw}`);
  }
  return closedMin + (draw % (closedMax - closedMin + 1n));
}
