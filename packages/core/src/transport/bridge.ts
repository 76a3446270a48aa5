import { z } from "zod";
import { ROUTES, toJsonArgs, type Address, type BridgeTransport } from "@erc20kit/shared";
import type { Decoder, WalletContext } from "../contract.js";
import { addressSchema, decodeOrThrow } from "../schemas.js";

/** Invokes `<base>.<fn>` on the bridge and decodes the JSON result. */
export class BridgeRoutes {
  constructor(
    private readonly bridge: BridgeTransport,
    readonly base: string,
  ) {}

  async call<T>(fn: string, decoder: Decoder<T>, ...args: unknown[]): Promise<T> {
    const route = `${this.base}.${fn}`;
    const raw = await this.bridge.invoke(route, toJsonArgs(...args));
    return decodeOrThrow(decoder, raw, `${route} response`);
  }

  child(segment: string): BridgeRoutes {
    return new BridgeRoutes(this.bridge, `${this.base}.${segment}`);
  }
}

export class BridgeWalletContext implements WalletContext {
  private readonly routes: BridgeRoutes;

  constructor(bridge: BridgeTransport) {
    this.routes = new BridgeRoutes(bridge, ROUTES.WALLET);
  }

  getAddress(): Promise<Address> {
    return this.routes.call("getAddress", addressSchema);
  }

  getChainId(): Promise<number> {
    return this.routes.call("getChainId", z.number().int().positive());
  }
}
