import {
  MetadataUnavailableError,
  UnsupportedOperationError,
  type Address,
  type ClaimCondition,
  type ClaimerProofs,
} from "@erc20kit/shared";
import { reads } from "./calls.js";
import type { NativeRuntime } from "./contract.js";
import { EMPTY_CURRENCY, readCurrency, toCurrencyValue } from "./currency.js";
import { logger, type Logger } from "./utils/logger.js";

export interface ClaimConditions {
  getActive(): Promise<ClaimCondition>;
  canClaim(quantity: string, addressToCheck?: Address): Promise<boolean>;
  getIneligibilityReasons(quantity: string, addressToCheck?: Address): Promise<string[]>;
  getClaimerProofs(claimerAddress: Address): Promise<ClaimerProofs | null>;
}

const BRIDGE_ONLY = "is only available through the bridge runtime";

export class LocalClaimConditions implements ClaimConditions {
  private readonly log: Logger;

  constructor(
    private readonly address: Address,
    private readonly runtime: NativeRuntime,
  ) {
    this.log = logger.child({ token: address, component: "claim-conditions" });
  }

  async getActive(): Promise<ClaimCondition> {
    const { reader } = this.runtime;
    const conditionId = await reader.read(this.address, reads.getActiveClaimConditionId());
    const condition = await reader.read(this.address, reads.getClaimConditionById(conditionId));

    // Pricing must stay computable without display metadata.
    let currency = EMPTY_CURRENCY;
    try {
      currency = await readCurrency(reader, condition.currency);
    } catch (err) {
      const unavailable = new MetadataUnavailableError(condition.currency, { cause: err });
      this.log.warn(unavailable.message, { code: unavailable.code, conditionId, error: err });
    }

    return {
      availableSupply: (condition.maxClaimableSupply - condition.supplyClaimed).toString(),
      currentMintSupply: condition.supplyClaimed.toString(),
      maxClaimableSupply: condition.maxClaimableSupply.toString(),
      maxClaimablePerWallet: condition.quantityLimitPerWallet.toString(),
      currencyAddress: condition.currency,
      currencyMetadata: toCurrencyValue(currency, condition.pricePerToken, this.runtime.displayDecimals),
    };
  }

  async canClaim(_quantity: string, _addressToCheck?: Address): Promise<boolean> {
    throw new UnsupportedOperationError(`canClaim ${BRIDGE_ONLY}`);
  }

  async getIneligibilityReasons(_quantity: string, _addressToCheck?: Address): Promise<string[]> {
    throw new UnsupportedOperationError(`getIneligibilityReasons ${BRIDGE_ONLY}`);
  }

  async getClaimerProofs(_claimerAddress: Address): Promise<ClaimerProofs | null> {
    throw new UnsupportedOperationError(`getClaimerProofs ${BRIDGE_ONLY}`);
  }
}
