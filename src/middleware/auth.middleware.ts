import type { Request, Response, NextFunction, RequestHandler } from "express";
import logger from "../utils/logger";

const BEARER = /^Bearer\s+(\S+)\s*$/;

/**
 * Guards the run API with the SERVER_API_KEY bearer token. Rejections are
 * logged with the route so a misconfigured caller can be traced.
 */
export function createAuthMiddleware(expectedToken?: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const route = `${req.method} ${req.originalUrl}`;

    if (!expectedToken) {
      logger.error(`SERVER_API_KEY not configured, refusing ${route}`);
      res.status(500).json({ error: "Server configuration error" });
      return;
    }

    const match = BEARER.exec(req.headers.authorization ?? "");
    if (!match) {
      logger.warn(`Run API request without bearer token: ${route}`);
      res.status(401).json({ error: "Unauthorized: run API requires a bearer token" });
      return;
    }

    if (match[1] !== expectedToken) {
      logger.warn(`Run API request with invalid API key: ${route}`);
      res.status(401).json({ error: "Unauthorized: invalid API key" });
      return;
    }

    next();
  };
}
