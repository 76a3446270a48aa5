import { privateKeyToAccount } from "viem/accounts";
import { mainnet } from "viem/chains";
import { HttpBridgeTransport } from "@erc20kit/sdk";
import { UnsupportedOperationError } from "@erc20kit/shared";
import { BridgedErc20 } from "../../src/bridged.js";
import type { TokenConfig } from "../../src/config.js";
import type { NativeRuntime, RestrictedRuntime, TokenRuntime } from "../../src/contract.js";
import { LocalErc20 } from "../../src/erc20.js";
import { createErc20, createRuntime, resolveChain } from "../../src/runtime.js";
import { BridgeWalletContext } from "../../src/transport/bridge.js";
import {
  ReadOnlyContractWriter,
  ReadOnlyWalletContext,
  ViemContractReader,
  ViemContractWriter,
  ViemWalletContext,
} from "../../src/transport/viem.js";
import { MINTER_KEY, TOKEN } from "../helpers/fakes.js";

process.env.LOG_LEVEL = "error";

const RPC_URL = "http://127.0.0.1:8545";

function config(overrides: Partial<TokenConfig> = {}): TokenConfig {
  return { runtime: "native", chainId: 31337, port: 0, displayDecimals: 4, rpcUrl: RPC_URL, ...overrides };
}

function native(runtime: TokenRuntime): NativeRuntime {
  if (runtime.kind !== "native") throw new Error(`expected a native runtime, got ${runtime.kind}`);
  return runtime;
}

function restricted(runtime: TokenRuntime): RestrictedRuntime {
  if (runtime.kind !== "restricted") throw new Error(`expected a restricted runtime, got ${runtime.kind}`);
  return runtime;
}

describe("createRuntime", () => {
  test("builds a signing native runtime when a key is configured", async () => {
    const runtime = native(createRuntime(config({ privateKey: MINTER_KEY, displayDecimals: 2 })));

    expect(runtime.reader).toBeInstanceOf(ViemContractReader);
    expect(runtime.writer).toBeInstanceOf(ViemContractWriter);
    expect(runtime.wallet).toBeInstanceOf(ViemWalletContext);
    expect(runtime.signer).toBe(runtime.wallet);
    expect(runtime.displayDecimals).toBe(2);
    await expect(runtime.wallet.getAddress()).resolves.toBe(privateKeyToAccount(MINTER_KEY).address);
  });

  test("falls back to a read-only native runtime without a key", async () => {
    const runtime = native(createRuntime(config()));

    expect(runtime.writer).toBeInstanceOf(ReadOnlyContractWriter);
    expect(runtime.wallet).toBeInstanceOf(ReadOnlyWalletContext);
    expect(runtime.signer).toBeUndefined();
    await expect(runtime.wallet.getAddress()).rejects.toBeInstanceOf(UnsupportedOperationError);
  });

  test("builds a restricted runtime over the HTTP bridge", () => {
    const runtime = restricted(
      createRuntime(config({ runtime: "restricted", rpcUrl: undefined, bridgeUrl: "http://bridge.test" })),
    );

    expect(runtime.bridge).toBeInstanceOf(HttpBridgeTransport);
    expect(runtime.wallet).toBeInstanceOf(BridgeWalletContext);
  });

  test("requires the endpoint each runtime kind talks to", () => {
    expect(() => createRuntime(config({ rpcUrl: undefined }))).toThrow("rpcUrl is required for the native runtime");
    expect(() => createRuntime(config({ runtime: "restricted" }))).toThrow(
      "bridgeUrl is required for the restricted runtime",
    );
  });
});

describe("resolveChain", () => {
  test("returns viem's definition for a known chain", () => {
    expect(resolveChain(1, RPC_URL)).toBe(mainnet);
  });

  test("defines an unknown chain against the configured RPC URL", () => {
    const chain = resolveChain(31337, RPC_URL);

    expect(chain.id).toBe(31337);
    expect(chain.name).toBe("chain-31337");
    expect(chain.rpcUrls.default.http).toEqual([RPC_URL]);
    expect(chain.nativeCurrency.decimals).toBe(18);
  });
});

describe("createErc20", () => {
  test("picks the implementation matching the runtime kind", () => {
    expect(createErc20(TOKEN, createRuntime(config()))).toBeInstanceOf(LocalErc20);
    expect(
      createErc20(TOKEN, createRuntime(config({ runtime: "restricted", bridgeUrl: "http://bridge.test" }))),
    ).toBeInstanceOf(BridgedErc20);
  });
});
