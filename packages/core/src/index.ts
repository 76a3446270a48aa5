import type { Server } from "http";
import type { Express } from "express";
import { loadConfig, type TokenConfig } from "./config.js";
import type { NativeRuntime } from "./contract.js";
import { createRuntime } from "./runtime.js";
import { createApp } from "./server.js";
import { logger } from "./utils/logger.js";

export { loadConfig, type TokenConfig, type RuntimeKind } from "./config.js";
export type {
  ContractCall,
  ContractFunction,
  ContractReader,
  ContractWriter,
  Decoder,
  MintRequestSigner,
  NativeRuntime,
  RestrictedRuntime,
  TokenRuntime,
  WalletContext,
} from "./contract.js";
export { TOKEN_ABI } from "./abi.js";
export { reads, writes, type AllowlistProof } from "./calls.js";
export { toBaseUnits, rescale, format, nativeValue, parseAmount } from "./decimals.js";
export { EMPTY_CURRENCY, readCurrency, toCurrencyValue, isNativeToken } from "./currency.js";
export {
  createMintPayload,
  buildMintRequest,
  toSignedPayloadOutput,
  mintRequestFromSignedPayload,
  generateUid,
  decodeUid,
  parseAddress,
  type MintRequest,
  type MintPayloadInput,
} from "./voucher.js";
export {
  MINT_REQUEST_TYPES,
  mintRequestDomain,
  mintRequestTypedData,
  domainSeparator,
  mintRequestStructHash,
  mintRequestDigest,
  signMintRequest,
  recoverMintRequestSigner,
  type MintRequestDomain,
  type MintRequestTypedData,
} from "./eip712.js";
export { LocalClaimConditions, type ClaimConditions } from "./claim-conditions.js";
export { LocalSignatureMinting, voucherValue, type SignatureMinting } from "./signature.js";
export { LocalErc20, type Erc20 } from "./erc20.js";
export { BridgedErc20, BridgedClaimConditions, BridgedSignatureMinting } from "./bridged.js";
export { BridgeRoutes, BridgeWalletContext } from "./transport/bridge.js";
export {
  ViemContractReader,
  ViemContractWriter,
  type ReceiptWaitOptions,
  ViemWalletContext,
  ReadOnlyContractWriter,
  ReadOnlyWalletContext,
} from "./transport/viem.js";
export { createRuntime, createErc20, resolveChain } from "./runtime.js";
export { dispatchRoute } from "./routes.js";
export { createApp, toErrorResponse } from "./server.js";
export { logger, type Logger, type LogLevel } from "./utils/logger.js";

export interface BridgeHost {
  app: Express;
  config: TokenConfig;
  start(): Promise<Server>;
  stop(): Promise<void>;
}

export function createBridgeHost(overrides?: { config?: TokenConfig; runtime?: NativeRuntime }): BridgeHost {
  const config = overrides?.config ?? loadConfig();
  const runtime = overrides?.runtime ?? createRuntime(config);
  if (runtime.kind !== "native") {
    throw new Error("The bridge host serves a native runtime; set ERC20_RUNTIME=native");
  }

  const { app } = createApp({ config, runtime });
  let server: Server | null = null;

  return {
    app,
    config,
    async start() {
      return new Promise<Server>((resolve) => {
        const listening = app.listen(config.port, () => {
          logger.info(`Bridge host listening on port ${config.port}`);
          resolve(listening);
        });
        server = listening;
      });
    },
    async stop() {
      const current = server;
      if (current) {
        await new Promise<void>((resolve, reject) => {
          current.close((err) => (err ? reject(err) : resolve()));
        });
        server = null;
      }
    },
  };
}
