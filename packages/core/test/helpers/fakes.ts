import { privateKeyToAccount } from "viem/accounts";
import {
  RouteNotFoundError,
  type Address,
  type BridgeInvocation,
  type BridgeTransport,
  type Currency,
  type Hex,
  type TransactionResult,
} from "@erc20kit/shared";
import type {
  ContractCall,
  ContractFunction,
  ContractReader,
  ContractWriter,
  MintRequestSigner,
  NativeRuntime,
  WalletContext,
} from "../../src/contract.js";
import type { MintRequestTypedData } from "../../src/eip712.js";
import { decodeOrThrow } from "../../src/schemas.js";
import type { MintRequest } from "../../src/voucher.js";

export const MINTER_KEY: Hex = `0x${"11".repeat(32)}`;
export const OTHER_KEY: Hex = `0x${"22".repeat(32)}`;

export const TOKEN: Address = "0x1000000000000000000000000000000000000001";
export const CURRENCY: Address = "0x2000000000000000000000000000000000000002";
export const HOLDER: Address = "0x3000000000000000000000000000000000000003";
export const SPENDER: Address = "0x4000000000000000000000000000000000000004";
export const SALE: Address = "0x5000000000000000000000000000000000000005";

export const TX_HASH: Hex = `0x${"ab".repeat(32)}`;

type ReadHandler = (args: readonly unknown[]) => unknown;

/**
 * In-memory contract state keyed by address then function name. Reading a
 * function with no stub fails the way a revert would.
 */
export class FakeContractReader implements ContractReader {
  private contracts = new Map<string, Map<string, ReadHandler>>();
  readonly calls: { address: Address; functionName: string; args: readonly unknown[] }[] = [];

  stub(address: Address, functionName: string, value: unknown): this {
    return this.stubWith(address, functionName, () => value);
  }

  stubWith(address: Address, functionName: string, handler: ReadHandler): this {
    const key = address.toLowerCase();
    const functions = this.contracts.get(key) ?? new Map<string, ReadHandler>();
    functions.set(functionName, handler);
    this.contracts.set(key, functions);
    return this;
  }

  stubCurrency(address: Address, currency: Currency): this {
    return this.stub(address, "name", currency.name)
      .stub(address, "symbol", currency.symbol)
      .stub(address, "decimals", currency.decimals);
  }

  async read<TResult>(address: Address, call: ContractCall<TResult>): Promise<TResult> {
    this.calls.push({ address, functionName: call.functionName, args: call.args });
    const handler = this.contracts.get(address.toLowerCase())?.get(call.functionName);
    if (!handler) {
      throw new Error(`execution reverted: ${call.functionName} on ${address}`);
    }
    return decodeOrThrow(call.decode, await handler(call.args), `${call.functionName} result`);
  }
}

export interface WriteRecord {
  address: Address;
  functionName: string;
  args: readonly unknown[];
  value: bigint;
}

export class FakeContractWriter implements ContractWriter {
  readonly writes: WriteRecord[] = [];

  async write(address: Address, call: ContractFunction, value: bigint): Promise<TransactionResult> {
    this.writes.push({ address, functionName: call.functionName, args: call.args, value });
    return {
      status: "confirmed",
      hash: TX_HASH,
      receipt: {
        transactionHash: TX_HASH,
        blockHash: `0x${"cd".repeat(32)}`,
        blockNumber: "7",
        gasUsed: "21000",
        from: HOLDER,
        to: address,
      },
    };
  }
}

export class FakeWallet implements WalletContext {
  constructor(
    readonly address: Address = HOLDER,
    readonly chainId = 31337,
  ) {}

  async getAddress(): Promise<Address> {
    return this.address;
  }

  async getChainId(): Promise<number> {
    return this.chainId;
  }
}

export class KeySigner implements MintRequestSigner {
  constructor(private readonly key: Hex) {}

  signMintRequest(typedData: MintRequestTypedData): Promise<Hex> {
    return privateKeyToAccount(this.key).signTypedData(typedData);
  }
}

export function createFakeRuntime(overrides: Partial<NativeRuntime> = {}) {
  const reader = new FakeContractReader();
  const writer = new FakeContractWriter();
  const runtime: NativeRuntime = {
    kind: "native",
    reader,
    writer,
    wallet: new FakeWallet(),
    displayDecimals: 4,
    ...overrides,
  };
  return { runtime, reader, writer };
}

/** Answers bridge routes from a table; unknown routes fail like the host does. */
export class FakeBridge implements BridgeTransport {
  private responses = new Map<string, unknown>();
  readonly invocations: BridgeInvocation[] = [];

  respond(route: string, value: unknown): this {
    this.responses.set(route, value);
    return this;
  }

  async invoke(route: string, jsonArgs: string[]): Promise<unknown> {
    this.invocations.push({ route, args: jsonArgs });
    if (!this.responses.has(route)) {
      throw new RouteNotFoundError(route);
    }
    return this.responses.get(route);
  }
}

export function isMintRequest(value: unknown): value is MintRequest {
  return (
    typeof value === "object" &&
    value !== null &&
    "to" in value &&
    typeof value.to === "string" &&
    "quantity" in value &&
    typeof value.quantity === "bigint" &&
    "price" in value &&
    typeof value.price === "bigint" &&
    "uid" in value &&
    typeof value.uid === "string"
  );
}
