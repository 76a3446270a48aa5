import type { Address, Currency, CurrencyValue, TransactionResult } from "@erc20kit/shared";
import { reads, writes, type AllowlistProof } from "./calls.js";
import { LocalClaimConditions, type ClaimConditions } from "./claim-conditions.js";
import type { ContractFunction, NativeRuntime } from "./contract.js";
import { isNativeToken, readCurrency, toCurrencyValue } from "./currency.js";
import { nativeValue, toBaseUnits } from "./decimals.js";
import { LocalSignatureMinting, type SignatureMinting } from "./signature.js";
import { parseAddress } from "./voucher.js";

/**
 * ERC20 operations on one token contract. Amounts are human-readable
 * decimal strings; they are scaled to the token's decimals before submission.
 */
export interface Erc20 {
  readonly address: Address;
  readonly claimConditions: ClaimConditions;
  readonly signature: SignatureMinting;

  get(): Promise<Currency>;
  balance(): Promise<CurrencyValue>;
  balanceOf(address: string): Promise<CurrencyValue>;
  allowance(spender: string): Promise<CurrencyValue>;
  allowanceOf(owner: string, spender: string): Promise<CurrencyValue>;
  totalSupply(): Promise<CurrencyValue>;

  setAllowance(spender: string, amount: string): Promise<TransactionResult>;
  transfer(to: string, amount: string): Promise<TransactionResult>;
  transferFrom(from: string, to: string, amount: string): Promise<TransactionResult>;
  burn(amount: string): Promise<TransactionResult>;
  claim(amount: string): Promise<TransactionResult>;
  claimTo(address: string, amount: string): Promise<TransactionResult>;
  mint(amount: string): Promise<TransactionResult>;
  mintTo(address: string, amount: string): Promise<TransactionResult>;
}

export class LocalErc20 implements Erc20 {
  readonly claimConditions: LocalClaimConditions;
  readonly signature: LocalSignatureMinting;

  constructor(
    readonly address: Address,
    private readonly runtime: NativeRuntime,
  ) {
    this.claimConditions = new LocalClaimConditions(address, runtime);
    this.signature = new LocalSignatureMinting(address, runtime);
  }

  get(): Promise<Currency> {
    return readCurrency(this.runtime.reader, this.address);
  }

  async balance(): Promise<CurrencyValue> {
    return this.balanceOf(await this.runtime.wallet.getAddress());
  }

  async balanceOf(address: string): Promise<CurrencyValue> {
    const account = parseAddress(address, "address");
    const currency = await this.get();
    const raw = await this.runtime.reader.read(this.address, reads.balanceOf(account));
    return toCurrencyValue(currency, raw, this.runtime.displayDecimals);
  }

  async allowance(spender: string): Promise<CurrencyValue> {
    return this.allowanceOf(await this.runtime.wallet.getAddress(), spender);
  }

  async allowanceOf(owner: string, spender: string): Promise<CurrencyValue> {
    const ownerAddress = parseAddress(owner, "owner");
    const spenderAddress = parseAddress(spender, "spender");
    const currency = await this.get();
    const raw = await this.runtime.reader.read(this.address, reads.allowance(ownerAddress, spenderAddress));
    return toCurrencyValue(currency, raw, this.runtime.displayDecimals);
  }

  async totalSupply(): Promise<CurrencyValue> {
    const currency = await this.get();
    const raw = await this.runtime.reader.read(this.address, reads.totalSupply());
    return toCurrencyValue(currency, raw, this.runtime.displayDecimals);
  }

  async setAllowance(spender: string, amount: string): Promise<TransactionResult> {
    const spenderAddress = parseAddress(spender, "spender");
    return this.submit(writes.approve(spenderAddress, await this.baseUnits(amount)));
  }

  async transfer(to: string, amount: string): Promise<TransactionResult> {
    const recipient = parseAddress(to, "to");
    return this.submit(writes.transfer(recipient, await this.baseUnits(amount)));
  }

  async transferFrom(from: string, to: string, amount: string): Promise<TransactionResult> {
    const sender = parseAddress(from, "from");
    const recipient = parseAddress(to, "to");
    return this.submit(writes.transferFrom(sender, recipient, await this.baseUnits(amount)));
  }

  async burn(amount: string): Promise<TransactionResult> {
    return this.submit(writes.burn(await this.baseUnits(amount)));
  }

  async claim(amount: string): Promise<TransactionResult> {
    return this.claimTo(await this.runtime.wallet.getAddress(), amount);
  }

  /**
   * Claims from the active condition without an allowlist proof. The quantity
   * is scaled to the token's own decimals, unlike signature vouchers.
   */
  async claimTo(address: string, amount: string): Promise<TransactionResult> {
    const receiver = parseAddress(address, "address");
    const condition = await this.claimConditions.getActive();
    const decimals = await this.decimals();
    const quantity = toBaseUnits(amount, decimals);
    const pricePerToken = BigInt(condition.currencyMetadata.rawValue);
    // Priced on the submitted quantity, after truncation to the token's decimals.
    const value = isNativeToken(condition.currencyAddress) ? nativeValue(quantity, decimals, pricePerToken) : 0n;

    const proof: AllowlistProof = {
      proof: [],
      quantityLimitPerWallet: BigInt(condition.maxClaimablePerWallet),
      pricePerToken,
      currency: condition.currencyAddress,
    };
    return this.submit(writes.claim(receiver, quantity, condition.currencyAddress, pricePerToken, proof), value);
  }

  async mint(amount: string): Promise<TransactionResult> {
    return this.mintTo(await this.runtime.wallet.getAddress(), amount);
  }

  async mintTo(address: string, amount: string): Promise<TransactionResult> {
    const recipient = parseAddress(address, "address");
    return this.submit(writes.mintTo(recipient, await this.baseUnits(amount)));
  }

  private decimals(): Promise<number> {
    return this.runtime.reader.read(this.address, reads.decimals());
  }

  private async baseUnits(amount: string): Promise<bigint> {
    return toBaseUnits(amount, await this.decimals());
  }

  private submit(call: ContractFunction, value = 0n): Promise<TransactionResult> {
    return this.runtime.writer.write(this.address, call, value);
  }
}
