import {
  DEFAULTS,
  NATIVE_TOKEN_ADDRESS,
  type Address,
  type Currency,
  type CurrencyValue,
} from "@erc20kit/shared";
import { reads } from "./calls.js";
import type { ContractReader } from "./contract.js";
import { format } from "./decimals.js";

export const EMPTY_CURRENCY: Currency = { name: "", symbol: "", decimals: DEFAULTS.CURRENCY_DECIMALS };

export async function readCurrency(reader: ContractReader, token: Address): Promise<Currency> {
  const decimals = await reader.read(token, reads.decimals());
  const name = await reader.read(token, reads.name());
  const symbol = await reader.read(token, reads.symbol());
  return { name, symbol, decimals };
}

export function toCurrencyValue(currency: Currency, rawValue: bigint, displayDecimals: number): CurrencyValue {
  return {
    ...currency,
    rawValue: rawValue.toString(),
    displayValue: format(rawValue, currency.decimals, displayDecimals, true),
  };
}

export function isNativeToken(currency: Address): boolean {
  return currency.toLowerCase() === NATIVE_TOKEN_ADDRESS.toLowerCase();
}
