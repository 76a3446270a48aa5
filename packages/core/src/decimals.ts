import { formatUnits, parseUnits } from "viem";
import { DEFAULTS, ParseError } from "@erc20kit/shared";

const DECIMAL_AMOUNT = /^(\d+\.?\d*|\.\d+)$/;
const VOUCHER = DEFAULTS.VOUCHER_DECIMALS;

function assertDecimals(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ParseError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Parses a human amount at the fixed 18-decimal intermediate precision.
 * Digits past the 18th are dropped, never rounded.
 */
export function parseAmount(amount: string): bigint {
  const trimmed = amount.trim();
  if (!DECIMAL_AMOUNT.test(trimmed)) {
    throw new ParseError(`Invalid amount '${amount}': expected a non-negative decimal number`);
  }
  const [whole = "", fraction = ""] = trimmed.split(".");
  return parseUnits(`${whole || "0"}.${fraction.slice(0, VOUCHER) || "0"}`, VOUCHER);
}

export function rescale(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  assertDecimals(fromDecimals, "fromDecimals");
  assertDecimals(toDecimals, "toDecimals");
  if (fromDecimals === toDecimals) return value;

  const factor = 10n ** BigInt(Math.abs(fromDecimals - toDecimals));
  return toDecimals > fromDecimals ? value * factor : value / factor;
}

export function toBaseUnits(amount: string, decimals: number): bigint {
  return rescale(parseAmount(amount), VOUCHER, decimals);
}

export function format(
  rawValue: bigint,
  decimals: number,
  displayDecimals: number = DEFAULTS.DISPLAY_DECIMALS,
  includeCommas = true,
): string {
  assertDecimals(decimals, "decimals");
  assertDecimals(displayDecimals, "displayDecimals");

  const [whole = "0", fraction = ""] = formatUnits(rawValue, decimals).split(".");
  const grouped = includeCommas ? whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",") : whole;
  const shown = fraction.slice(0, displayDecimals).replace(/0+$/, "");
  return shown ? `${grouped}.${shown}` : grouped;
}

/** Payable value of `quantity` base units (at `decimals`) priced per whole token. */
export function nativeValue(quantity: bigint, decimals: number, pricePerToken: bigint): bigint {
  assertDecimals(decimals, "decimals");
  return (quantity * pricePerToken) / 10n ** BigInt(decimals);
}

export function parseInteger(value: string, label: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`${label} must be a non-negative integer string, got '${value}'`);
  }
  return BigInt(value);
}
