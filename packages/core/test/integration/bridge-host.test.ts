import request from "supertest";
import { createApp } from "../../src/server.js";
import type { TokenConfig } from "../../src/config.js";
import { HOLDER, SPENDER, TOKEN, TX_HASH, createFakeRuntime } from "../helpers/fakes.js";

// Keep request logs out of the test output
process.env.LOG_LEVEL = "error";

const config: TokenConfig = {
  runtime: "native",
  chainId: 31337,
  port: 0,
  displayDecimals: 4,
  rpcUrl: "http://localhost:8545",
};

function setup(overrides: Partial<TokenConfig> = {}) {
  const fake = createFakeRuntime();
  fake.reader.stubCurrency(TOKEN, { name: "Test Token", symbol: "TT", decimals: 6 });
  const { app } = createApp({ config: { ...config, ...overrides }, runtime: fake.runtime });
  return { ...fake, app };
}

function invoke(app: ReturnType<typeof setup>["app"], route: string, args: unknown[]) {
  return request(app)
    .post("/invoke")
    .send({ route, args: args.map((arg) => JSON.stringify(arg)) });
}

describe("bridge host", () => {
  test("GET /health", async () => {
    const { app } = setup();
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  test("serves token reads", async () => {
    const { app, reader } = setup();
    reader.stub(TOKEN, "balanceOf", 2_500_000n);

    const res = await invoke(app, `${TOKEN}.erc20.balanceOf`, [HOLDER]);

    expect(res.status).toBe(200);
    expect(res.body.result).toEqual({
      name: "Test Token",
      symbol: "TT",
      decimals: 6,
      rawValue: "2500000",
      displayValue: "2.5",
    });
  });

  test("serves allowanceOf as owner then spender", async () => {
    const { app, reader } = setup();
    reader.stubWith(TOKEN, "allowance", ([owner, spender]) =>
      owner === HOLDER && spender === SPENDER ? 750_000n : 0n,
    );

    const res = await invoke(app, `${TOKEN}.erc20.allowanceOf`, [HOLDER, SPENDER]);
    const missingSpender = await invoke(app, `${TOKEN}.erc20.allowanceOf`, [HOLDER]);

    expect(res.status).toBe(200);
    expect(res.body.result.displayValue).toBe("0.75");
    expect(missingSpender.status).toBe(400);
  });

  test("serves writes with the transaction result", async () => {
    const { app, writer } = setup();

    const res = await invoke(app, `${TOKEN}.erc20.transfer`, [SPENDER, "1"]);

    expect(res.status).toBe(200);
    expect(res.body.result.status).toBe("confirmed");
    expect(res.body.result.hash).toBe(TX_HASH);
    expect(writer.writes[0].args).toEqual([SPENDER, 1_000_000n]);
  });

  test("serves the wallet routes", async () => {
    const { app } = setup();
    const address = await invoke(app, "sdk.wallet.getAddress", []);
    const chainId = await invoke(app, "sdk.wallet.getChainId", []);

    expect(address.body.result).toBe(HOLDER);
    expect(chainId.body.result).toBe(31337);
  });

  test("unknown routes are 404", async () => {
    const { app } = setup();
    const res = await invoke(app, `${TOKEN}.erc20.selfDestruct`, []);

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({
      code: "ROUTE_NOT_FOUND",
      message: `No bridge route for '${TOKEN}.erc20.selfDestruct'`,
    });
  });

  test("malformed arguments are 400", async () => {
    const { app } = setup();
    const notJson = await request(app)
      .post("/invoke")
      .send({ route: `${TOKEN}.erc20.balanceOf`, args: ["{oops"] });
    const wrongArity = await invoke(app, `${TOKEN}.erc20.transfer`, [SPENDER]);
    const noArgs = await request(app).post("/invoke").send({ route: `${TOKEN}.erc20.get` });

    expect(notJson.status).toBe(400);
    expect(notJson.body.error).toEqual({ code: "PARSE_ERROR", message: "argument 0 is not valid JSON" });
    expect(wrongArity.status).toBe(400);
    expect(noArgs.status).toBe(400);
  });

  test("operations the native runtime cannot serve are 501", async () => {
    const { app } = setup();
    const res = await invoke(app, `${TOKEN}.erc20.claimConditions.canClaim`, ["1", null]);

    expect(res.status).toBe(501);
    expect(res.body.error.code).toBe("UNSUPPORTED_OPERATION");
  });

  test("a configured API key is required", async () => {
    const { app } = setup({ bridgeApiKey: "test-secret" });

    const denied = await invoke(app, "sdk.wallet.getChainId", []);
    const allowed = await request(app)
      .post("/invoke")
      .set("Authorization", "Bearer test-secret")
      .send({ route: "sdk.wallet.getChainId", args: [] });

    expect(denied.status).toBe(401);
    expect(denied.body.error.code).toBe("UNAUTHORIZED");
    expect(allowed.status).toBe(200);
    expect(allowed.body.result).toBe(31337);
  });
});
