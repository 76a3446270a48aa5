/**
 * Out-of-process substitute for the contract reader, writer and wallet on
 * restricted runtime targets. Routes look like `<token>.erc20.balanceOf`;
 * every argument travels as its own JSON document.
 */
export interface BridgeTransport {
  invoke(route: string, jsonArgs: string[]): Promise<unknown>;
}

export interface BridgeInvocation {
  route: string;
  args: string[];
}

export function toJsonArgs(...args: unknown[]): string[] {
  return args.map((arg) => JSON.stringify(arg ?? null));
}
