/**
 * BackgammonBits - Bitmask algebra over board points
 *
 * Bit i stands for point index i (0..25), so every mask fits a 32-bit int.
 *
 * @module backgammon/BackgammonBits
 */

/** Mask with the bits of all given point indices set */
export function bitsFromIndices(indices: Iterable<number>): number {
  let mask = 0;
  for (const i of indices) {
    mask |= 1 << i;
  }
  return mask;
}

/** Set bit indices of a mask, ascending */
export function indicesFromBits(mask: number): number[] {
  const indices: number[] = [];
  let rest = mask;
  while (rest !== 0) {
    const lsb = rest & -rest;
    indices.push(31 - Math.clz32(lsb));
    rest &= rest - 1;
  }
  return indices;
}

export function setBit(index: number, mask: number = 0): number {
  return mask | (1 << index);
}

export function clearBit(index: number, mask: number): number {
  return mask & ~(1 << index);
}

export function isBitSet(index: number, mask: number): boolean {
  return (mask & (1 << index)) !== 0;
}

/** Mask with bits start..end (inclusive) set */
export function setAllBits(start: number, end: number): number {
  let mask = 0;
  for (let i = start; i <= end; i++) {
    mask |= 1 << i;
  }
  return mask;
}

/**
 * Shift all set bits by `steps`.
 * Positive steps move towards higher points, negative towards lower ones.
 * Bits shifted below 0 are dropped; callers clip the high end with a board mask.
 */
export function shiftMask(mask: number, steps: number): number {
  return steps >= 0 ? mask << steps : mask >>> -steps;
}

/** `mask` without the bits of `remove` */
export function removeFromMask(mask: number, remove: number): number {
  return mask & ~remove;
}

/** Population count */
export function countBits(mask: number): number {
  let count = 0;
  let rest = mask;
  while (rest !== 0) {
    rest &= rest - 1;
    count++;
  }
  return count;
}

export function maskIntersectionCount(a: number, b: number): number {
  return countBits(a & b);
}
