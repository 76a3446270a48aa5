import { v4 as uuidv4 } from "uuid";
import {
  HEADERS,
  errorFromCode,
  isErrorCode,
  type BridgeInvocation,
  type BridgeTransport,
} from "@erc20kit/shared";

export interface HttpBridgeTransportOptions {
  bridgeBaseUrl: string;
  apiKey?: string;
  fetch?: typeof fetch;
}

/** Non-2xx bridge response whose body carries no known error code. */
export class BridgeRequestError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "BridgeRequestError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Client side of the bridge: every invocation is a `POST /invoke` carrying
 * the route and its JSON-encoded arguments.
 */
export class HttpBridgeTransport implements BridgeTransport {
  private baseUrl: string;
  private apiKey?: string;
  private fetchFn: typeof fetch;
  private invocations: BridgeInvocation[] = [];

  constructor(options: HttpBridgeTransportOptions) {
    this.baseUrl = options.bridgeBaseUrl.replace(/\/$/, "");
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? fetch;
  }

  async invoke(route: string, jsonArgs: string[]): Promise<unknown> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      [HEADERS.REQUEST_ID]: uuidv4(),
    };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }

    this.invocations.push({ route, args: [...jsonArgs] });

    const res = await this.fetchFn(`${this.baseUrl}/invoke`, {
      method: "POST",
      headers,
      body: JSON.stringify({ route, args: jsonArgs }),
    });

    const data: unknown = await res.json().catch(() => null);

    if (!res.ok) {
      const error = isRecord(data) && isRecord(data.error) ? data.error : null;
      const message = error && typeof error.message === "string" ? error.message : `Bridge responded ${res.status}`;
      if (error && isErrorCode(error.code)) {
        throw errorFromCode(error.code, message);
      }
      throw new BridgeRequestError(res.status, message);
    }

    if (!isRecord(data) || !("result" in data)) {
      throw new BridgeRequestError(res.status, `Bridge response for ${route} has no result`);
    }
    return data.result;
  }

  getInvocations(): BridgeInvocation[] {
    return [...this.invocations];
  }
}
