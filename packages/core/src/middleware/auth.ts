import type { Request, Response, NextFunction } from "express";

/** Bearer-token guard for the bridge; a no-op when no key is configured. */
export function createBridgeAuth(apiKey?: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const auth = req.headers.authorization;
    if (!auth || !auth.startsWith("Bearer ") || auth.slice(7) !== apiKey) {
      res.status(401).json({ error: { code: "UNAUTHORIZED", message: "Invalid bridge API key" } });
      return;
    }

    next();
  };
}
