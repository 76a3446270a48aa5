import { createPublicClient, createWalletClient, defineChain, http, type Chain } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { mainnet, sepolia } from "viem/chains";
import { HttpBridgeTransport } from "@erc20kit/sdk";
import type { Address } from "@erc20kit/shared";
import { BridgedErc20 } from "./bridged.js";
import type { TokenConfig } from "./config.js";
import type { NativeRuntime, TokenRuntime } from "./contract.js";
import { LocalErc20, type Erc20 } from "./erc20.js";
import { BridgeWalletContext } from "./transport/bridge.js";
import {
  ReadOnlyContractWriter,
  ReadOnlyWalletContext,
  ViemContractReader,
  ViemContractWriter,
  ViemWalletContext,
} from "./transport/viem.js";
import { parseAddress } from "./voucher.js";
import { logger } from "./utils/logger.js";

const KNOWN_CHAINS: Chain[] = [mainnet, sepolia];

export function resolveChain(chainId: number, rpcUrl: string): Chain {
  return (
    KNOWN_CHAINS.find((chain) => chain.id === chainId) ??
    defineChain({
      id: chainId,
      name: `chain-${chainId}`,
      nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
      rpcUrls: { default: { http: [rpcUrl] } },
    })
  );
}

function createNativeRuntime(config: TokenConfig, rpcUrl: string): NativeRuntime {
  const chain = resolveChain(config.chainId, rpcUrl);
  const client = createPublicClient({ chain, transport: http(rpcUrl) });
  const reader = new ViemContractReader(client);

  if (!config.privateKey) {
    logger.info("No private key configured, running read-only", { chainId: chain.id });
    return {
      kind: "native",
      reader,
      writer: new ReadOnlyContractWriter(),
      wallet: new ReadOnlyWalletContext(client),
      displayDecimals: config.displayDecimals,
    };
  }

  const wallet = createWalletClient({
    account: privateKeyToAccount(config.privateKey),
    chain,
    transport: http(rpcUrl),
  });
  const context = new ViemWalletContext(wallet);
  return {
    kind: "native",
    reader,
    writer: new ViemContractWriter(wallet, client),
    wallet: context,
    signer: context,
    displayDecimals: config.displayDecimals,
  };
}

export function createRuntime(config: TokenConfig): TokenRuntime {
  if (config.runtime === "restricted") {
    if (!config.bridgeUrl) {
      throw new Error("bridgeUrl is required for the restricted runtime");
    }
    const bridge = new HttpBridgeTransport({ bridgeBaseUrl: config.bridgeUrl, apiKey: config.bridgeApiKey });
    logger.info("Using bridge runtime", { bridgeUrl: config.bridgeUrl });
    return { kind: "restricted", bridge, wallet: new BridgeWalletContext(bridge) };
  }

  if (!config.rpcUrl) {
    throw new Error("rpcUrl is required for the native runtime");
  }
  return createNativeRuntime(config, config.rpcUrl);
}

export function createErc20(address: string, runtime: TokenRuntime): Erc20 {
  const token: Address = parseAddress(address, "token address");
  return runtime.kind === "native" ? new LocalErc20(token, runtime) : new BridgedErc20(token, runtime);
}
