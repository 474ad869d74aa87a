import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import type { TradeService } from "../trades/service.js";
import type { User } from "../trades/types.js";
import { AuthError } from "../errors.js";

/** Raw key as presented: X-API-Key, or a Bearer token. */
export function presentedKey(req: Request): string | undefined {
  return req.get("x-api-key") ?? req.get("authorization")?.replace(/^Bearer\s+/i, "") ?? undefined;
}

const authenticated = new WeakMap<Request, User>();

function currentUser(req: Request): User {
  const user = authenticated.get(req);
  if (!user) throw new AuthError("Missing API key");
  return user;
}

export function apiKeyAuth(service: TradeService): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    authenticated.set(req, service.authenticate(presentedKey(req)));
    next();
  };
}

export function createRouter(service: TradeService, tradeLimiter: RequestHandler): Router {
  const router = Router();
  const auth = apiKeyAuth(service);

  // ── Users ──────────────────────────────────────────────────────────────

  router.post("/users", (req, res) => {
    res.status(201).json(service.registerUser(req.body));
  });

  router.get("/users/me", auth, (req, res) => {
    res.json(currentUser(req));
  });

  router.put("/users/me", auth, (req, res) => {
    res.json(service.updateUser(currentUser(req), req.body));
  });

  // Revokes the presented key; the old key never authenticates again
  router.post("/users/me/api-key", auth, (req, res) => {
    const apiKey = service.rotateApiKey(currentUser(req), presentedKey(req) ?? "");
    res.status(201).json({ api_key: apiKey });
  });

  // ── Trades ─────────────────────────────────────────────────────────────

  router.post("/trades", auth, tradeLimiter, (req, res) => {
    res.status(202).json(service.submitTrade(currentUser(req), req.body));
  });

  router.get("/trades", auth, (req, res) => {
    res.json(service.listTrades(currentUser(req), req.query));
  });

  router.get("/trades/:id", auth, (req, res) => {
    res.json(service.getTrade(currentUser(req), req.params.id));
  });

  router.delete("/trades/:id", auth, (req, res) => {
    service.deleteTrade(currentUser(req), req.params.id);
    res.json({ deleted: req.params.id });
  });

  // ── Analytics ──────────────────────────────────────────────────────────

  router.get("/analytics/history", auth, (req, res) => {
    res.json(service.getHistoricalAnalytics(currentUser(req), req.query));
  });

  return router;
}
