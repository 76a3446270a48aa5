import { isAddressEqual } from "viem";
import {
  DEFAULTS,
  SignatureMismatchError,
  UnsupportedOperationError,
  ZERO_ADDRESS,
  type Address,
  type Hex,
  type MintPayload,
  type SignedPayload,
  type TransactionResult,
} from "@erc20kit/shared";
import { reads, writes } from "./calls.js";
import type { NativeRuntime } from "./contract.js";
import { isNativeToken } from "./currency.js";
import { nativeValue } from "./decimals.js";
import {
  mintRequestDomain,
  mintRequestTypedData,
  recoverMintRequestSigner,
  signMintRequest,
  type MintRequestDomain,
} from "./eip712.js";
import { buildMintRequest, mintRequestFromSignedPayload, toSignedPayloadOutput, type MintRequest } from "./voucher.js";
import { logger, type Logger } from "./utils/logger.js";

export interface SignatureMinting {
  generate(payload: MintPayload, privateKey?: Hex): Promise<SignedPayload>;
  verify(signedPayload: SignedPayload): Promise<boolean>;
  mint(signedPayload: SignedPayload): Promise<TransactionResult>;
}

interface Preflight {
  req: MintRequest;
  recovered: Address;
  accepted: boolean;
  contractSigner: Address;
}

/** Payable value of a voucher: both amounts carry 18 decimals. */
export function voucherValue(req: MintRequest): bigint {
  if (!isNativeToken(req.currency)) return 0n;
  return nativeValue(req.quantity, DEFAULTS.VOUCHER_DECIMALS, req.price);
}

export class LocalSignatureMinting implements SignatureMinting {
  private readonly log: Logger;

  constructor(
    private readonly address: Address,
    private readonly runtime: NativeRuntime,
  ) {
    this.log = logger.child({ token: address, component: "signature" });
  }

  async generate(payload: MintPayload, privateKey?: Hex): Promise<SignedPayload> {
    const primarySaleRecipient =
      payload.primarySaleRecipient.toLowerCase() !== ZERO_ADDRESS
        ? payload.primarySaleRecipient
        : await this.runtime.reader.read(this.address, reads.primarySaleRecipient());

    const req = buildMintRequest(payload, primarySaleRecipient);
    const domain = await this.domain();

    let signature: Hex;
    if (privateKey) {
      signature = await signMintRequest(domain, req, privateKey);
    } else if (this.runtime.signer) {
      signature = await this.runtime.signer.signMintRequest(mintRequestTypedData(domain, req));
    } else {
      throw new UnsupportedOperationError("No private key supplied and no wallet signer is connected");
    }

    this.log.debug("Generated signed mint payload", { uid: req.uid, to: req.to });
    return { signature, payload: toSignedPayloadOutput(req) };
  }

  async verify(signedPayload: SignedPayload): Promise<boolean> {
    const { accepted, recovered, contractSigner } = await this.preflight(signedPayload);
    if (!accepted) return false;
    if (!isAddressEqual(recovered, contractSigner)) {
      throw new SignatureMismatchError(
        `Contract accepted the payload as signed by ${contractSigner} but the signature recovers to ${recovered}`,
      );
    }
    return true;
  }

  async mint(signedPayload: SignedPayload): Promise<TransactionResult> {
    const { req, accepted, recovered, contractSigner } = await this.preflight(signedPayload);
    if (!accepted || !isAddressEqual(recovered, contractSigner)) {
      throw new SignatureMismatchError(`Contract rejected the mint request signed by ${recovered} (uid ${req.uid})`);
    }

    const value = voucherValue(req);
    this.log.info("Minting with signature", { uid: req.uid, to: req.to, value });
    return this.runtime.writer.write(this.address, writes.mintWithSignature(req, signedPayload.signature), value);
  }

  private async domain(): Promise<MintRequestDomain> {
    const name = await this.runtime.reader.read(this.address, reads.name());
    const chainId = await this.runtime.wallet.getChainId();
    return mintRequestDomain(name, chainId, this.address);
  }

  private async preflight(signedPayload: SignedPayload): Promise<Preflight> {
    const req = mintRequestFromSignedPayload(signedPayload.payload);
    const recovered = await recoverMintRequestSigner(await this.domain(), req, signedPayload.signature);
    const [accepted, contractSigner] = await this.runtime.reader.read(
      this.address,
      reads.verify(req, signedPayload.signature),
    );
    return { req, recovered, accepted, contractSigner };
  }
}
