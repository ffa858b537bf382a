/**
 * @fileoverview A 4-bit ripple-carry adder built from logic gates
 *
 * HOW IT WORKS:
 * Each column of a binary sum is a full adder: it takes two input bits and
 * the carry from the column to its right, and produces a sum bit plus a
 * carry for the column to its left. Four full adders chained right-to-left
 * add two 4-bit numbers:
 *
 * ```
 *   carryIn ─▶ [FA bit3] ─▶ [FA bit2] ─▶ [FA bit1] ─▶ [FA bit0] ─▶ carryOut
 * ```
 *
 * The carry "ripples" through the chain, hence the name.
 *
 * Bits are stored most significant first, so `[1, 0, 1, 0]` is 10 and the
 * chain walks the array from index 3 down to index 0.
 */

// ============================================================================
// TYPES
// ============================================================================

export type Bit = 0 | 1;

/** Four bits, most significant first. */
export type Nibble = readonly [Bit, Bit, Bit, Bit];

export type AdderOutput = {
  sum: Nibble;
  carryOut: Bit;
};

type ColumnOutput = {
  sum: Bit;
  carry: Bit;
};

// ============================================================================
// GATES
// ============================================================================

export function andGate(a: Bit, b: Bit): Bit {
  return a === 1 && b === 1 ? 1 : 0;
}

export function orGate(a: Bit, b: Bit): Bit {
  return a === 1 || b === 1 ? 1 : 0;
}

export function xorGate(a: Bit, b: Bit): Bit {
  return a !== b ? 1 : 0;
}

export function notGate(a: Bit): Bit {
  return a === 1 ? 0 : 1;
}

// ============================================================================
// ADDERS
// ============================================================================

export function halfAdder(a: Bit, b: Bit): ColumnOutput {
  return {
    sum: xorGate(a, b),
    carry: andGate(a, b),
  };
}

/**
 * One column of the sum: two half adders, with their carries or'ed.
 *
 * @example
 * fullAdder(1, 1, 1); // { sum: 1, carry: 1 }
 */
export function fullAdder(a: Bit, b: Bit, carryIn: Bit): ColumnOutput {
  const first = halfAdder(a, b);
  const second = halfAdder(first.sum, carryIn);

  return {
    sum: second.sum,
    carry: orGate(first.carry, second.carry),
  };
}

/**
 * Adds two nibbles plus an incoming carry.
 *
 * @example
 * rippleCarryAdder([1, 0, 1, 0], [0, 1, 1, 1], 0);
 * // { sum: [0, 0, 0, 1], carryOut: 1 }   (10 + 7 = 17 = 16 + 1)
 */
export function rippleCarryAdder(a: Nibble, b: Nibble, carryIn: Bit): AdderOutput {
  const column3 = fullAdder(a[3], b[3], carryIn);
  const column2 = fullAdder(a[2], b[2], column3.carry);
  const column1 = fullAdder(a[1], b[1], column2.carry);
  const column0 = fullAdder(a[0], b[0], column1.carry);

  return {
    sum: [column0.sum, column1.sum, column2.sum, column3.sum],
    carryOut: column0.carry,
  };
}

// ============================================================================
// CONVERSIONS
// ============================================================================

function bitAt(n: number, position: number): Bit {
  return (n >> position) & 1 ? 1 : 0;
}

/**
 * @throws RangeError unless `n` is an integer in 0..15
 *
 * @example
 * toNibble(10); // [1, 0, 1, 0]
 */
export function toNibble(n: number): Nibble {
  if (!Number.isInteger(n) || n < 0 || n > 15) {
    throw new RangeError(`Expected an integer between 0 and 15, got ${n}`);
  }

  return [bitAt(n, 3), bitAt(n, 2), bitAt(n, 1), bitAt(n, 0)];
}

export function fromNibble(bits: Nibble): number {
  return bits.reduce<number>((total, bit) => total * 2 + bit, 0);
}

/** `[0, 0, 0, 1]` becomes `"0001"`. */
export function formatNibble(bits: Nibble): string {
  return bits.join("");
}

/**
 * Number-in, number-out wrapper around the gate-level adder.
 *
 * @example
 * addNumbers(10, 7); // { sum: 1, carryOut: 1 }
 */
export function addNumbers(
  a: number,
  b: number,
  carryIn: Bit = 0
): { sum: number; carryOut: Bit } {
  const result = rippleCarryAdder(toNibble(a), toNibble(b), carryIn);

  return {
    sum: fromNibble(result.sum),
    carryOut: result.carryOut,
  };
}
