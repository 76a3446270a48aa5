import type { Address, BridgeTransport, Hex, TransactionResult } from "@erc20kit/shared";
import type { MintRequestTypedData } from "./eip712.js";

/** Anything with a zod-style `parse`; narrows an untyped value or throws. */
export interface Decoder<T> {
  parse(data: unknown): T;
}

export interface ContractFunction {
  functionName: string;
  args: readonly unknown[];
}

export interface ContractCall<TResult> extends ContractFunction {
  decode: Decoder<TResult>;
}

export interface ContractReader {
  read<TResult>(address: Address, call: ContractCall<TResult>): Promise<TResult>;
}

export interface ContractWriter {
  write(address: Address, call: ContractFunction, value: bigint): Promise<TransactionResult>;
}

/** The connected wallet and chain; read-only from this package's point of view. */
export interface WalletContext {
  getAddress(): Promise<Address>;
  getChainId(): Promise<number>;
}

/** Signs with the connected wallet when no private key is supplied. */
export interface MintRequestSigner {
  signMintRequest(typedData: MintRequestTypedData): Promise<Hex>;
}

export interface NativeRuntime {
  kind: "native";
  reader: ContractReader;
  writer: ContractWriter;
  wallet: WalletContext;
  signer?: MintRequestSigner;
  displayDecimals: number;
}

export interface RestrictedRuntime {
  kind: "restricted";
  bridge: BridgeTransport;
  wallet: WalletContext;
}

/** Chosen once at startup; operations never branch on it. */
export type TokenRuntime = NativeRuntime | RestrictedRuntime;
