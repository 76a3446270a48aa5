import { z } from "zod";
import {
  ROUTES,
  type Address,
  type ClaimCondition,
  type ClaimerProofs,
  type Currency,
  type CurrencyValue,
  type Hex,
  type MintPayload,
  type SignedPayload,
  type TransactionResult,
} from "@erc20kit/shared";
import type { ClaimConditions } from "./claim-conditions.js";
import type { RestrictedRuntime } from "./contract.js";
import { mintRequestDomain, signMintRequest } from "./eip712.js";
import type { Erc20 } from "./erc20.js";
import {
  claimConditionSchema,
  claimerProofsSchema,
  currencySchema,
  currencyValueSchema,
  signedPayloadSchema,
  transactionResultSchema,
} from "./schemas.js";
import type { SignatureMinting } from "./signature.js";
import { BridgeRoutes } from "./transport/bridge.js";
import { buildMintRequest, toSignedPayloadOutput } from "./voucher.js";

export class BridgedClaimConditions implements ClaimConditions {
  constructor(private readonly routes: BridgeRoutes) {}

  getActive(): Promise<ClaimCondition> {
    return this.routes.call("getActive", claimConditionSchema);
  }

  canClaim(quantity: string, addressToCheck?: Address): Promise<boolean> {
    return this.routes.call("canClaim", z.boolean(), quantity, addressToCheck);
  }

  getIneligibilityReasons(quantity: string, addressToCheck?: Address): Promise<string[]> {
    return this.routes.call("getClaimIneligibilityReasons", z.array(z.string()), quantity, addressToCheck);
  }

  getClaimerProofs(claimerAddress: Address): Promise<ClaimerProofs | null> {
    return this.routes.call("getClaimerProofs", claimerProofsSchema, claimerAddress);
  }
}

export class BridgedSignatureMinting implements SignatureMinting {
  constructor(
    private readonly address: Address,
    private readonly routes: BridgeRoutes,
    private readonly token: BridgeRoutes,
    private readonly runtime: RestrictedRuntime,
  ) {}

  /**
   * The bridge signs unless a key is supplied; with a key, the bridge only
   * resolves the sale recipient and the voucher is re-signed locally.
   */
  async generate(payload: MintPayload, privateKey?: Hex): Promise<SignedPayload> {
    const signed = await this.routes.call("generate", signedPayloadSchema, payload);
    if (!privateKey) return signed;

    const { name } = await this.token.call("get", currencySchema);
    const domain = mintRequestDomain(name, await this.runtime.wallet.getChainId(), this.address);
    const req = buildMintRequest(payload, signed.payload.primarySaleRecipient);
    return { signature: await signMintRequest(domain, req, privateKey), payload: toSignedPayloadOutput(req) };
  }

  verify(signedPayload: SignedPayload): Promise<boolean> {
    return this.routes.call("verify", z.boolean(), signedPayload);
  }

  mint(signedPayload: SignedPayload): Promise<TransactionResult> {
    return this.routes.call("mint", transactionResultSchema, signedPayload);
  }
}

export class BridgedErc20 implements Erc20 {
  readonly claimConditions: BridgedClaimConditions;
  readonly signature: BridgedSignatureMinting;
  private readonly routes: BridgeRoutes;

  constructor(
    readonly address: Address,
    runtime: RestrictedRuntime,
  ) {
    this.routes = new BridgeRoutes(runtime.bridge, `${address}.${ROUTES.ERC20}`);
    this.claimConditions = new BridgedClaimConditions(this.routes.child(ROUTES.CLAIM_CONDITIONS));
    this.signature = new BridgedSignatureMinting(address, this.routes.child(ROUTES.SIGNATURE), this.routes, runtime);
  }

  get(): Promise<Currency> {
    return this.routes.call("get", currencySchema);
  }

  balance(): Promise<CurrencyValue> {
    return this.routes.call("balance", currencyValueSchema);
  }

  balanceOf(address: string): Promise<CurrencyValue> {
    return this.routes.call("balanceOf", currencyValueSchema, address);
  }

  allowance(spender: string): Promise<CurrencyValue> {
    return this.routes.call("allowance", currencyValueSchema, spender);
  }

  allowanceOf(owner: string, spender: string): Promise<CurrencyValue> {
    return this.routes.call("allowanceOf", currencyValueSchema, owner, spender);
  }

  totalSupply(): Promise<CurrencyValue> {
    return this.routes.call("totalSupply", currencyValueSchema);
  }

  setAllowance(spender: string, amount: string): Promise<TransactionResult> {
    return this.routes.call("setAllowance", transactionResultSchema, spender, amount);
  }

  transfer(to: string, amount: string): Promise<TransactionResult> {
    return this.routes.call("transfer", transactionResultSchema, to, amount);
  }

  transferFrom(from: string, to: string, amount: string): Promise<TransactionResult> {
    return this.routes.call("transferFrom", transactionResultSchema, from, to, amount);
  }

  burn(amount: string): Promise<TransactionResult> {
    return this.routes.call("burn", transactionResultSchema, amount);
  }

  claim(amount: string): Promise<TransactionResult> {
    return this.routes.call("claim", transactionResultSchema, amount);
  }

  claimTo(address: string, amount: string): Promise<TransactionResult> {
    return this.routes.call("claimTo", transactionResultSchema, address, amount);
  }

  mint(amount: string): Promise<TransactionResult> {
    return this.routes.call("mint", transactionResultSchema, amount);
  }

  mintTo(address: string, amount: string): Promise<TransactionResult> {
    return this.routes.call("mintTo", transactionResultSchema, address, amount);
  }
}
