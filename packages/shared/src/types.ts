export type Hex = `0x${string}`;

export type Address = `0x${string}`;

export interface Currency {
  name: string;
  symbol: string;
  decimals: number;
}

export interface CurrencyValue extends Currency {
  /** Exact amount in base units, as a decimal integer string. */
  rawValue: string;
  displayValue: string;
}

export interface ClaimCondition {
  availableSupply: string;
  currentMintSupply: string;
  maxClaimableSupply: string;
  maxClaimablePerWallet: string;
  currencyAddress: Address;
  /** The price per token, expressed in the sale currency. */
  currencyMetadata: CurrencyValue;
}

export interface ClaimerProofs {
  address: Address;
  proof: Hex[];
  maxClaimable: string;
  price?: string;
  currencyAddress?: Address;
}

export interface MintPayload {
  to: Address;
  /** Human-readable amount, e.g. "12.5". */
  quantity: string;
  price: string;
  currencyAddress: Address;
  primarySaleRecipient: Address;
  uid: Hex;
  /** Unix seconds. */
  mintStartTime: number;
  mintEndTime: number;
}

export interface SignedPayloadOutput {
  to: Address;
  /** Base units at 18 decimals. */
  quantity: string;
  price: string;
  currencyAddress: Address;
  primarySaleRecipient: Address;
  uid: Hex;
  mintStartTime: number;
  mintEndTime: number;
}

export interface SignedPayload {
  signature: Hex;
  payload: SignedPayloadOutput;
}

export type TransactionState = "pending" | "submitted" | "confirmed" | "reverted" | "failed";

export interface TransactionReceiptSummary {
  transactionHash: Hex;
  blockHash: Hex;
  blockNumber: string;
  gasUsed: string;
  from: Address;
  to: Address | null;
}

export interface TransactionResult {
  status: Extract<TransactionState, "confirmed" | "reverted">;
  hash: Hex;
  receipt: TransactionReceiptSummary;
}
