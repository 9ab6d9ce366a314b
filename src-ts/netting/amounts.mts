import { AmountOverflowError, NettingInvariantError } from './errors.mts';

export const U64_MAX = (1n << 64n) - 1n;

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

export function addAmounts(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > U64_MAX) {
    throw new AmountOverflowError(`Amount overflow: ${a} + ${b} exceeds u64`, {
      left: a.toString(),
      right: b.toString()
    });
  }
  return sum;
}

export function subtractAmount(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new NettingInvariantError(`Amount underflow: ${a} - ${b}`, {
      left: a.toString(),
      right: b.toString()
    });
  }
  return a - b;
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
