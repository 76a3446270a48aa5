import { z } from "zod";
import type { Address, Hex } from "@erc20kit/shared";
import type { ContractCall, ContractFunction } from "./contract.js";
import type { MintRequest } from "./voucher.js";
import { addressSchema, claimConditionStructSchema, type ClaimConditionStruct } from "./schemas.js";

const uint256 = z.bigint();

export interface AllowlistProof {
  proof: Hex[];
  quantityLimitPerWallet: bigint;
  pricePerToken: bigint;
  currency: Address;
}

export const reads = {
  name: (): ContractCall<string> => ({ functionName: "name", args: [], decode: z.string() }),
  symbol: (): ContractCall<string> => ({ functionName: "symbol", args: [], decode: z.string() }),
  decimals: (): ContractCall<number> => ({
    functionName: "decimals",
    args: [],
    decode: z.number().int().nonnegative(),
  }),
  totalSupply: (): ContractCall<bigint> => ({ functionName: "totalSupply", args: [], decode: uint256 }),
  balanceOf: (account: Address): ContractCall<bigint> => ({
    functionName: "balanceOf",
    args: [account],
    decode: uint256,
  }),
  allowance: (owner: Address, spender: Address): ContractCall<bigint> => ({
    functionName: "allowance",
    args: [owner, spender],
    decode: uint256,
  }),
  primarySaleRecipient: (): ContractCall<Address> => ({
    functionName: "primarySaleRecipient",
    args: [],
    decode: addressSchema,
  }),
  verify: (req: MintRequest, signature: Hex): ContractCall<readonly [boolean, Address]> => ({
    functionName: "verify",
    args: [req, signature],
    decode: z.tuple([z.boolean(), addressSchema]),
  }),
  getActiveClaimConditionId: (): ContractCall<bigint> => ({
    functionName: "getActiveClaimConditionId",
    args: [],
    decode: uint256,
  }),
  getClaimConditionById: (conditionId: bigint): ContractCall<ClaimConditionStruct> => ({
    functionName: "getClaimConditionById",
    args: [conditionId],
    decode: claimConditionStructSchema,
  }),
};

export const writes = {
  approve: (spender: Address, amount: bigint): ContractFunction => ({ functionName: "approve", args: [spender, amount] }),
  transfer: (to: Address, amount: bigint): ContractFunction => ({ functionName: "transfer", args: [to, amount] }),
  transferFrom: (from: Address, to: Address, amount: bigint): ContractFunction => ({
    functionName: "transferFrom",
    args: [from, to, amount],
  }),
  burn: (amount: bigint): ContractFunction => ({ functionName: "burn", args: [amount] }),
  mintTo: (to: Address, amount: bigint): ContractFunction => ({ functionName: "mintTo", args: [to, amount] }),
  mintWithSignature: (req: MintRequest, signature: Hex): ContractFunction => ({
    functionName: "mintWithSignature",
    args: [req, signature],
  }),
  claim: (
    receiver: Address,
    quantity: bigint,
    currency: Address,
    pricePerToken: bigint,
    allowlistProof: AllowlistProof,
  ): ContractFunction => ({
    functionName: "claim",
    args: [receiver, quantity, currency, pricePerToken, allowlistProof, "0x"],
  }),
};
