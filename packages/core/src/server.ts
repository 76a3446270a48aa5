import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { ErrorCode, HEADERS, TokenError } from "@erc20kit/shared";
import type { TokenConfig } from "./config.js";
import type { NativeRuntime } from "./contract.js";
import { createBridgeAuth } from "./middleware/auth.js";
import { dispatchRoute } from "./routes.js";
import { logger } from "./utils/logger.js";

export interface CreateAppOptions {
  config: TokenConfig;
  runtime: NativeRuntime;
}

const invokeBody = z.object({
  route: z.string().min(1),
  args: z.array(z.string()),
});

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.PARSE_ERROR]: 400,
  [ErrorCode.ROUTE_NOT_FOUND]: 404,
  [ErrorCode.SIGNATURE_MISMATCH]: 409,
  [ErrorCode.UNSUPPORTED_OPERATION]: 501,
  [ErrorCode.TRANSACTION_FAILED]: 502,
};

export function toErrorResponse(err: unknown): { status: number; code: string; message: string } {
  if (err instanceof TokenError) {
    return { status: STATUS_BY_CODE[err.code] ?? 500, code: err.code, message: err.message };
  }
  return { status: 500, code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : String(err) };
}

export function createApp({ config, runtime }: CreateAppOptions) {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(rateLimit({ windowMs: 60_000, limit: 300 }));
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/invoke", createBridgeAuth(config.bridgeApiKey), async (req, res) => {
    const requestId = req.header(HEADERS.REQUEST_ID) ?? uuidv4();
    const log = logger.child({ requestId });
    const startTime = performance.now();

    const body = invokeBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: { code: ErrorCode.PARSE_ERROR, message: "Expected { route, args: string[] }" } });
      return;
    }
    const { route, args } = body.data;

    try {
      const result = await dispatchRoute(runtime, route, args);
      log.info("Bridge route served", { route, latency_ms: Math.round(performance.now() - startTime) });
      res.json({ result: result ?? null });
    } catch (err) {
      const { status, code, message } = toErrorResponse(err);
      const level = status >= 500 ? "error" : "warn";
      log[level]("Bridge route failed", { route, code, error: err });
      res.status(status).json({ error: { code, message } });
    }
  });

  return { app };
}
