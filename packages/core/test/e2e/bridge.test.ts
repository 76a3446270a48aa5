import { privateKeyToAccount } from "viem/accounts";
import { isAddressEqual, isHex } from "viem";
import { HttpBridgeTransport } from "@erc20kit/sdk";
import { UnsupportedOperationError } from "@erc20kit/shared";
import { createBridgeHost, type BridgeHost } from "../../src/index.js";
import type { TokenConfig } from "../../src/config.js";
import { mintRequestDomain, recoverMintRequestSigner } from "../../src/eip712.js";
import { createErc20 } from "../../src/runtime.js";
import { BridgeWalletContext } from "../../src/transport/bridge.js";
import { createMintPayload } from "../../src/voucher.js";
import {
  CURRENCY,
  HOLDER,
  KeySigner,
  MINTER_KEY,
  SALE,
  TOKEN,
  createFakeRuntime,
  isMintRequest,
} from "../helpers/fakes.js";

process.env.LOG_LEVEL = "error";

const config: TokenConfig = {
  runtime: "native",
  chainId: 31337,
  port: 0,
  displayDecimals: 4,
  rpcUrl: "http://localhost:8545",
  bridgeApiKey: "test-secret",
};

const minter = privateKeyToAccount(MINTER_KEY);
const domain = mintRequestDomain("Test Token", 31337, TOKEN);

describe("restricted runtime over a live bridge host", () => {
  const fake = createFakeRuntime({ signer: new KeySigner(MINTER_KEY) });
  let host: BridgeHost;
  let transport: HttpBridgeTransport;

  beforeAll(async () => {
    fake.reader
      .stubCurrency(TOKEN, { name: "Test Token", symbol: "TT", decimals: 18 })
      .stubCurrency(CURRENCY, { name: "Test Dollar", symbol: "TUSD", decimals: 6 })
      .stub(TOKEN, "balanceOf", 12_345_600_000_000_000_000n)
      .stub(TOKEN, "primarySaleRecipient", SALE)
      .stub(TOKEN, "getActiveClaimConditionId", 0n)
      .stub(TOKEN, "getClaimConditionById", {
        startTimestamp: 0n,
        maxClaimableSupply: 1000n,
        supplyClaimed: 200n,
        quantityLimitPerWallet: 5n,
        merkleRoot: `0x${"00".repeat(32)}`,
        pricePerToken: 1_500_000n,
        currency: CURRENCY,
        metadata: "",
      })
      .stubWith(TOKEN, "verify", async ([req, signature]) => {
        if (!isMintRequest(req) || !isHex(signature)) throw new Error("execution reverted");
        const signer = await recoverMintRequestSigner(domain, req, signature);
        return [isAddressEqual(signer, minter.address), signer];
      });

    host = createBridgeHost({ config, runtime: fake.runtime });
    const server = await host.start();
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP listener");
    transport = new HttpBridgeTransport({ bridgeBaseUrl: `http://127.0.0.1:${address.port}`, apiKey: "test-secret" });
  });

  afterAll(async () => {
    await host.stop();
  });

  function token() {
    return createErc20(TOKEN, { kind: "restricted", bridge: transport, wallet: new BridgeWalletContext(transport) });
  }

  test("reads a balance through the bridge", async () => {
    const balance = await token().balanceOf(HOLDER);
    expect(balance.displayValue).toBe("12.3456");
    expect(balance.rawValue).toBe("12345600000000000000");
  });

  test("reads the active claim condition", async () => {
    const condition = await token().claimConditions.getActive();
    expect(condition.availableSupply).toBe("800");
    expect(condition.currencyMetadata.displayValue).toBe("1.5");
  });

  test("the bridge signs vouchers that then verify", async () => {
    const erc20 = token();
    const signed = await erc20.signature.generate(createMintPayload({ to: HOLDER, quantity: "1" }));

    expect(signed.payload.primarySaleRecipient).toBe(SALE);
    expect(await erc20.signature.verify(signed)).toBe(true);
  });

  test("host errors come back as the same error type", async () => {
    await expect(token().claimConditions.canClaim("1")).rejects.toThrow(UnsupportedOperationError);
  });

  test("the transport records every invocation", () => {
    expect(transport.getInvocations().map(({ route }) => route)).toContain(`${TOKEN}.erc20.balanceOf`);
  });
});
