import { formatUnits, parseUnits } from "viem";

const DECIMALS = 18;

/** A payout of 1.0 per contract */
export const ONE = 10n ** 18n;

/** Parse a decimal string ("0.02") into 1e18 fixed point. */
export function parseWad(value: string): bigint {
  return parseUnits(value.trim(), DECIMALS);
}

export function formatWad(value: bigint): string {
  return formatUnits(value, DECIMALS);
}

/** price (1e18) × contracts → cost (1e18) */
export function costOf(price: bigint, size: number): bigint {
  return price * BigInt(size);
}
