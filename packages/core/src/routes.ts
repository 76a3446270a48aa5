import { isAddress } from "viem";
import { z } from "zod";
import { ParseError, ROUTES, RouteNotFoundError } from "@erc20kit/shared";
import type { Decoder, NativeRuntime } from "./contract.js";
import { LocalErc20, type Erc20 } from "./erc20.js";
import { addressSchema, decodeOrThrow, mintPayloadSchema, signedPayloadSchema } from "./schemas.js";
import { parseAddress } from "./voucher.js";

type Handler = (token: Erc20, args: unknown[]) => Promise<unknown>;

const noArgs = z.tuple([]);
const amount = z.tuple([z.string()]);
const addressOnly = z.tuple([z.string()]);
const addressAmount = z.tuple([z.string(), z.string()]);
const ownerSpender = z.tuple([z.string(), z.string()]);
const quantityAndClaimer = z.tuple([z.string(), addressSchema.nullable()]);

function argsOf<T>(schema: Decoder<T>, args: unknown[], route: string): T {
  return decodeOrThrow(schema, args, `arguments for ${route}`);
}

function withoutArgs(route: string, op: (token: Erc20) => Promise<unknown>): Handler {
  return (token, args) => {
    argsOf(noArgs, args, route);
    return op(token);
  };
}

const TOKEN_HANDLERS = new Map<string, Handler>([
  ["get", withoutArgs("get", (token) => token.get())],
  ["balance", withoutArgs("balance", (token) => token.balance())],
  ["balanceOf", (token, args) => token.balanceOf(...argsOf(addressOnly, args, "balanceOf"))],
  ["allowance", (token, args) => token.allowance(...argsOf(addressOnly, args, "allowance"))],
  ["allowanceOf", (token, args) => token.allowanceOf(...argsOf(ownerSpender, args, "allowanceOf"))],
  ["totalSupply", withoutArgs("totalSupply", (token) => token.totalSupply())],
  ["setAllowance", (token, args) => token.setAllowance(...argsOf(addressAmount, args, "setAllowance"))],
  ["transfer", (token, args) => token.transfer(...argsOf(addressAmount, args, "transfer"))],
  [
    "transferFrom",
    (token, args) => token.transferFrom(...argsOf(z.tuple([z.string(), z.string(), z.string()]), args, "transferFrom")),
  ],
  ["burn", (token, args) => token.burn(...argsOf(amount, args, "burn"))],
  ["claim", (token, args) => token.claim(...argsOf(amount, args, "claim"))],
  ["claimTo", (token, args) => token.claimTo(...argsOf(addressAmount, args, "claimTo"))],
  ["mint", (token, args) => token.mint(...argsOf(amount, args, "mint"))],
  ["mintTo", (token, args) => token.mintTo(...argsOf(addressAmount, args, "mintTo"))],
  [`${ROUTES.CLAIM_CONDITIONS}.getActive`, withoutArgs("getActive", (token) => token.claimConditions.getActive())],
  [
    `${ROUTES.CLAIM_CONDITIONS}.canClaim`,
    (token, args) => {
      const [quantity, claimer] = argsOf(quantityAndClaimer, args, "canClaim");
      return token.claimConditions.canClaim(quantity, claimer ?? undefined);
    },
  ],
  [
    `${ROUTES.CLAIM_CONDITIONS}.getClaimIneligibilityReasons`,
    (token, args) => {
      const [quantity, claimer] = argsOf(quantityAndClaimer, args, "getClaimIneligibilityReasons");
      return token.claimConditions.getIneligibilityReasons(quantity, claimer ?? undefined);
    },
  ],
  [
    `${ROUTES.CLAIM_CONDITIONS}.getClaimerProofs`,
    (token, args) => token.claimConditions.getClaimerProofs(...argsOf(z.tuple([addressSchema]), args, "getClaimerProofs")),
  ],
  [
    `${ROUTES.SIGNATURE}.generate`,
    (token, args) => token.signature.generate(...argsOf(z.tuple([mintPayloadSchema]), args, "generate")),
  ],
  [
    `${ROUTES.SIGNATURE}.verify`,
    (token, args) => token.signature.verify(...argsOf(z.tuple([signedPayloadSchema]), args, "verify")),
  ],
  [
    `${ROUTES.SIGNATURE}.mint`,
    (token, args) => token.signature.mint(...argsOf(z.tuple([signedPayloadSchema]), args, "mint")),
  ],
]);

function parseJsonArg(arg: string, index: number): unknown {
  try {
    return JSON.parse(arg);
  } catch (err) {
    throw new ParseError(`argument ${index} is not valid JSON`, { cause: err });
  }
}

/**
 * Serves one bridge invocation against the native runtime. Routes are
 * `<token>.erc20.<op>` (with `claimConditions.` and `signature.` sub-routes)
 * or `sdk.wallet.<op>`.
 */
export async function dispatchRoute(runtime: NativeRuntime, route: string, jsonArgs: string[]): Promise<unknown> {
  const args = jsonArgs.map(parseJsonArg);

  if (route === `${ROUTES.WALLET}.getAddress`) return runtime.wallet.getAddress();
  if (route === `${ROUTES.WALLET}.getChainId`) return runtime.wallet.getChainId();

  const [token = "", namespace, ...rest] = route.split(".");
  const handler = TOKEN_HANDLERS.get(rest.join("."));
  if (namespace !== ROUTES.ERC20 || !isAddress(token, { strict: false }) || !handler) {
    throw new RouteNotFoundError(route);
  }
  return handler(new LocalErc20(parseAddress(token, "token address"), runtime), args);
}
