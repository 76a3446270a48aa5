import { bytesToHex, getAddress, isAddress, isHex, pad, size } from "viem";
import { parse as parseUuid, v4 as uuidv4 } from "uuid";
import {
  DEFAULTS,
  ParseError,
  ZERO_ADDRESS,
  type Address,
  type Hex,
  type MintPayload,
  type SignedPayloadOutput,
} from "@erc20kit/shared";
import { parseInteger, toBaseUnits } from "./decimals.js";

/** Mirror of the on-chain `MintRequest` struct, in declaration order. */
export interface MintRequest {
  to: Address;
  primarySaleRecipient: Address;
  quantity: bigint;
  price: bigint;
  currency: Address;
  validityStartTimestamp: bigint;
  validityEndTimestamp: bigint;
  uid: Hex;
}

export type MintPayloadInput = Pick<MintPayload, "to" | "quantity"> & Partial<MintPayload>;

/** Accepts any casing; the result is checksummed, as the ABI and typed-data encoders require. */
export function parseAddress(value: string, label: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ParseError(`${label} is not a valid address: '${value}'`);
  }
  return getAddress(value.toLowerCase());
}

export function decodeUid(uid: string): Hex {
  if (!isHex(uid, { strict: true }) || size(uid) !== 32) {
    throw new ParseError(`uid must be 32 bytes of hex, got '${uid}'`);
  }
  return uid;
}

/** 16 random bytes from a v4 uuid, left-padded to bytes32. */
export function generateUid(): Hex {
  return pad(bytesToHex(Uint8Array.from(parseUuid(uuidv4()))), { size: 32 });
}

function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function createMintPayload(input: MintPayloadInput, now: Date = new Date()): MintPayload {
  const end = new Date(now);
  end.setUTCFullYear(end.getUTCFullYear() + DEFAULTS.MINT_VALIDITY_YEARS);

  return {
    to: input.to,
    quantity: input.quantity,
    price: input.price ?? "0",
    currencyAddress: input.currencyAddress ?? ZERO_ADDRESS,
    primarySaleRecipient: input.primarySaleRecipient ?? ZERO_ADDRESS,
    uid: input.uid ?? generateUid(),
    mintStartTime: input.mintStartTime ?? unixSeconds(now),
    mintEndTime: input.mintEndTime ?? unixSeconds(end),
  };
}

function timestamp(value: number, label: string): bigint {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ParseError(`${label} must be a unix timestamp in seconds, got ${value}`);
  }
  return BigInt(value);
}

/**
 * Voucher amounts always use 18 decimals, whatever the token's own
 * decimals are; the contract expects that convention.
 */
export function buildMintRequest(payload: MintPayload, primarySaleRecipient: Address): MintRequest {
  return {
    to: parseAddress(payload.to, "to"),
    primarySaleRecipient: parseAddress(primarySaleRecipient, "primarySaleRecipient"),
    quantity: toBaseUnits(payload.quantity, DEFAULTS.VOUCHER_DECIMALS),
    price: toBaseUnits(payload.price, DEFAULTS.VOUCHER_DECIMALS),
    currency: parseAddress(payload.currencyAddress, "currencyAddress"),
    validityStartTimestamp: timestamp(payload.mintStartTime, "mintStartTime"),
    validityEndTimestamp: timestamp(payload.mintEndTime, "mintEndTime"),
    uid: decodeUid(payload.uid),
  };
}

export function toSignedPayloadOutput(req: MintRequest): SignedPayloadOutput {
  return {
    to: req.to,
    quantity: req.quantity.toString(),
    price: req.price.toString(),
    currencyAddress: req.currency,
    primarySaleRecipient: req.primarySaleRecipient,
    uid: req.uid,
    mintStartTime: Number(req.validityStartTimestamp),
    mintEndTime: Number(req.validityEndTimestamp),
  };
}

export function mintRequestFromSignedPayload(output: SignedPayloadOutput): MintRequest {
  return {
    to: parseAddress(output.to, "to"),
    primarySaleRecipient: parseAddress(output.primarySaleRecipient, "primarySaleRecipient"),
    quantity: parseInteger(output.quantity, "quantity"),
    price: parseInteger(output.price, "price"),
    currency: parseAddress(output.currencyAddress, "currencyAddress"),
    validityStartTimestamp: timestamp(output.mintStartTime, "mintStartTime"),
    validityEndTimestamp: timestamp(output.mintEndTime, "mintEndTime"),
    uid: decodeUid(output.uid),
  };
}
