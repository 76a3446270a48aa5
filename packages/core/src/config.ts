import { isHex } from "viem";
import { DEFAULTS, type Hex } from "@erc20kit/shared";

export type RuntimeKind = "native" | "restricted";

export interface TokenConfig {
  runtime: RuntimeKind;
  chainId: number;
  port: number;
  displayDecimals: number;
  rpcUrl?: string;
  privateKey?: Hex;
  bridgeUrl?: string;
  bridgeApiKey?: string;
}

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got '${raw}'`);
  }
  return value;
}

function isRuntimeKind(value: string): value is RuntimeKind {
  return value === "native" || value === "restricted";
}

export function loadConfig(env: Record<string, string | undefined> = process.env): TokenConfig {
  const runtime = env.ERC20_RUNTIME || "native";
  if (!isRuntimeKind(runtime)) {
    throw new Error(`ERC20_RUNTIME must be 'native' or 'restricted', got '${runtime}'`);
  }

  const config: TokenConfig = {
    runtime,
    chainId: parseInteger("ERC20_CHAIN_ID", env.ERC20_CHAIN_ID, 1),
    port: parseInteger("ERC20_PORT", env.ERC20_PORT, DEFAULTS.PORT),
    displayDecimals: parseInteger("ERC20_DISPLAY_DECIMALS", env.ERC20_DISPLAY_DECIMALS, DEFAULTS.DISPLAY_DECIMALS),
  };

  if (runtime === "native") {
    if (!env.ERC20_RPC_URL) {
      throw new Error("ERC20_RPC_URL is required for the native runtime");
    }
    config.rpcUrl = env.ERC20_RPC_URL;
  } else {
    if (!env.ERC20_BRIDGE_URL) {
      throw new Error("ERC20_BRIDGE_URL is required for the restricted runtime");
    }
    config.bridgeUrl = env.ERC20_BRIDGE_URL;
  }

  const privateKey = env.ERC20_PRIVATE_KEY;
  if (privateKey) {
    if (!isHex(privateKey) || privateKey.length !== 66) {
      throw new Error("ERC20_PRIVATE_KEY must be a 32-byte hex string");
    }
    config.privateKey = privateKey;
  }

  if (env.ERC20_BRIDGE_API_KEY) {
    config.bridgeApiKey = env.ERC20_BRIDGE_API_KEY;
  }

  return config;
}
