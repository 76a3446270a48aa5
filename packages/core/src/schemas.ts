import { z } from "zod";
import { isAddress, isHex } from "viem";
import { ParseError, type Address, type Hex } from "@erc20kit/shared";
import type { Decoder } from "./contract.js";

export const addressSchema = z.custom<Address>(
  (value) => typeof value === "string" && isAddress(value, { strict: false }),
  { message: "expected a 20-byte hex address" },
);

export const hexSchema = z.custom<Hex>((value) => isHex(value), { message: "expected a 0x-prefixed hex string" });

const integerString = z.string().regex(/^\d+$/, "expected a non-negative integer string");

export const currencySchema = z.object({
  name: z.string(),
  symbol: z.string(),
  decimals: z.number().int().nonnegative(),
});

export const currencyValueSchema = currencySchema.extend({
  rawValue: integerString,
  displayValue: z.string(),
});

export const claimConditionSchema = z.object({
  availableSupply: integerString,
  currentMintSupply: integerString,
  maxClaimableSupply: integerString,
  maxClaimablePerWallet: integerString,
  currencyAddress: addressSchema,
  currencyMetadata: currencyValueSchema,
});

export const claimerProofsSchema = z
  .object({
    address: addressSchema,
    proof: z.array(hexSchema),
    maxClaimable: z.string(),
    price: z.string().optional(),
    currencyAddress: addressSchema.optional(),
  })
  .nullable();

export const mintPayloadSchema = z.object({
  to: addressSchema,
  quantity: z.string(),
  price: z.string(),
  currencyAddress: addressSchema,
  primarySaleRecipient: addressSchema,
  uid: hexSchema,
  mintStartTime: z.number().int().nonnegative(),
  mintEndTime: z.number().int().nonnegative(),
});

export const signedPayloadSchema = z.object({
  signature: hexSchema,
  payload: mintPayloadSchema.extend({
    quantity: integerString,
    price: integerString,
  }),
});

export const transactionResultSchema = z.object({
  status: z.enum(["confirmed", "reverted"]),
  hash: hexSchema,
  receipt: z.object({
    transactionHash: hexSchema,
    blockHash: hexSchema,
    blockNumber: integerString,
    gasUsed: integerString,
    from: addressSchema,
    to: addressSchema.nullable(),
  }),
});

/** Raw `getClaimConditionById` tuple as decoded by viem. */
export const claimConditionStructSchema = z.object({
  startTimestamp: z.bigint(),
  maxClaimableSupply: z.bigint(),
  supplyClaimed: z.bigint(),
  quantityLimitPerWallet: z.bigint(),
  merkleRoot: hexSchema,
  pricePerToken: z.bigint(),
  currency: addressSchema,
  metadata: z.string(),
});

export type ClaimConditionStruct = z.infer<typeof claimConditionStructSchema>;

export function decodeOrThrow<T>(decoder: Decoder<T>, raw: unknown, label: string): T {
  try {
    return decoder.parse(raw);
  } catch (err) {
    throw new ParseError(`Unexpected ${label}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}
