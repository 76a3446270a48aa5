import {
  encodeFunctionData,
  type Chain,
  type PublicClient,
  type TransactionReceipt,
  type Transport,
  type WalletClient,
} from "viem";
import type { PrivateKeyAccount } from "viem/accounts";
import {
  TransactionFailedError,
  UnsupportedOperationError,
  type Address,
  type Hex,
  type TransactionReceiptSummary,
  type TransactionResult,
} from "@erc20kit/shared";
import { TOKEN_ABI } from "../abi.js";
import type {
  ContractCall,
  ContractFunction,
  ContractReader,
  ContractWriter,
  MintRequestSigner,
  WalletContext,
} from "../contract.js";
import type { MintRequestTypedData } from "../eip712.js";
import { decodeOrThrow } from "../schemas.js";
import { logger } from "../utils/logger.js";

export type RpcClient = PublicClient<Transport, Chain>;
export type SigningClient = WalletClient<Transport, Chain, PrivateKeyAccount>;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function summarizeReceipt(receipt: TransactionReceipt): TransactionReceiptSummary {
  return {
    transactionHash: receipt.transactionHash,
    blockHash: receipt.blockHash,
    blockNumber: receipt.blockNumber.toString(),
    gasUsed: receipt.gasUsed.toString(),
    from: receipt.from,
    to: receipt.to,
  };
}

export class ViemContractReader implements ContractReader {
  constructor(private readonly client: RpcClient) {}

  async read<TResult>(address: Address, call: ContractCall<TResult>): Promise<TResult> {
    const raw: unknown = await this.client.readContract({
      address,
      abi: TOKEN_ABI,
      functionName: call.functionName,
      args: call.args,
    });
    return decodeOrThrow(call.decode, raw, `${call.functionName} result`);
  }
}

/**
 * Submits and waits for one transaction. Nothing is retried; a failure at
 * either step surfaces as TransactionFailedError with the viem error as cause.
 */
export interface ReceiptWaitOptions {
  confirmations?: number;
  /** 0 waits indefinitely; unset keeps viem's default. */
  timeoutMs?: number;
}

export class ViemContractWriter implements ContractWriter {
  constructor(
    private readonly wallet: SigningClient,
    private readonly client: RpcClient,
    private readonly receiptWait: ReceiptWaitOptions = {},
  ) {}

  async write(address: Address, call: ContractFunction, value: bigint): Promise<TransactionResult> {
    const log = logger.child({ token: address, fn: call.functionName });
    log.debug("Transaction pending", { state: "pending", value });

    let hash: Hex;
    try {
      hash = await this.wallet.sendTransaction({
        account: this.wallet.account,
        chain: this.wallet.chain,
        to: address,
        data: encodeFunctionData({ abi: TOKEN_ABI, functionName: call.functionName, args: call.args }),
        value,
      });
    } catch (err) {
      log.error("Transaction failed before broadcast", { state: "failed", error: err });
      throw new TransactionFailedError(`${call.functionName} could not be submitted: ${describe(err)}`, { cause: err });
    }
    log.info("Transaction submitted", { state: "submitted", hash });

    let receipt: TransactionReceipt;
    try {
      receipt = await this.client.waitForTransactionReceipt({
        hash,
        confirmations: this.receiptWait.confirmations,
        timeout: this.receiptWait.timeoutMs,
      });
    } catch (err) {
      log.error("Transaction receipt unavailable", { state: "failed", hash, error: err });
      throw new TransactionFailedError(`${call.functionName} (${hash}) did not confirm: ${describe(err)}`, { cause: err });
    }

    const status = receipt.status === "success" ? "confirmed" : "reverted";
    log.info(`Transaction ${status}`, { state: status, hash, blockNumber: receipt.blockNumber });
    return { status, hash, receipt: summarizeReceipt(receipt) };
  }
}

/** Used when no private key is configured: reads work, writes are refused. */
export class ReadOnlyContractWriter implements ContractWriter {
  async write(_address: Address, call: ContractFunction, _value: bigint): Promise<TransactionResult> {
    throw new UnsupportedOperationError(`${call.functionName} needs a signing wallet; set ERC20_PRIVATE_KEY`);
  }
}

export class ViemWalletContext implements WalletContext, MintRequestSigner {
  constructor(private readonly wallet: SigningClient) {}

  async getAddress(): Promise<Address> {
    return this.wallet.account.address;
  }

  async getChainId(): Promise<number> {
    return this.wallet.getChainId();
  }

  async signMintRequest(typedData: MintRequestTypedData): Promise<Hex> {
    return this.wallet.signTypedData({ account: this.wallet.account, ...typedData });
  }
}

export class ReadOnlyWalletContext implements WalletContext {
  constructor(private readonly client: RpcClient) {}

  async getAddress(): Promise<Address> {
    throw new UnsupportedOperationError("No wallet is connected; set ERC20_PRIVATE_KEY");
  }

  async getChainId(): Promise<number> {
    return this.client.getChainId();
  }
}
