import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Server } from "node:http";
import { config } from "../config.js";
import { isDbWritable } from "../db/database.js";
import { ValidationError, errorMessage, httpStatusFor } from "../errors.js";
import { logRest, requestLogger } from "../logging.js";
import type { TradeService } from "../trades/service.js";
import { createRouter, presentedKey } from "./routes.js";

export interface AppDeps {
  service: TradeService;
  agentProvider: string;
  rateLimit?: number;
  tradeRateLimit?: number;
}

// Rate limiters are keyed by API key
const keyGenerator = (req: Request): string => presentedKey(req) ?? "anonymous";

// Suppress express-rate-limit IP validation (keyed by API key, not IP)
const rlOptions = { validate: { ip: false } } as const;

function limiter(limit: number, message: string) {
  return rateLimit({
    windowMs: 60_000,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator,
    message: { error: message },
    ...rlOptions,
  });
}

const startTime = Date.now();

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** Body parser failures carry `type: "entity.parse.failed"`. */
function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

/** Other body parser rejections (too large, bad charset or encoding) keep their 4xx status. */
function bodyReaderStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("type" in err) || typeof err.type !== "string") return undefined;
  if (!("status" in err) || typeof err.status !== "number") return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const readerStatus = isBodyParseError(err) ? undefined : bodyReaderStatus(err);
  if (readerStatus !== undefined && err instanceof Error) {
    res.status(readerStatus).json({ error: err.message, code: "invalid_body" });
    return;
  }
  const e = isBodyParseError(err) ? new ValidationError("Malformed JSON body") : err;
  const status = httpStatusFor(e);
  if (status >= 500) {
    logRest.error({ err: errorMessage(e), method: req.method, path: req.path }, "Unhandled request error");
  }
  res.status(status).json({
    error: status >= 500 ? "Internal server error" : errorMessage(e),
    code: errorCode(e),
    ...(e instanceof ValidationError && e.issues.length > 0 ? { issues: e.issues } : {}),
  });
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const globalLimit = deps.rateLimit ?? config.rest.rateLimit;
  const tradeLimit = deps.tradeRateLimit ?? config.rest.tradeRateLimit;

  app.use(cors());
  app.use(express.json({ limit: "256kb" }));
  app.use(requestLogger);

  // GET /health (unauthenticated)
  app.get("/health", (_req, res) => {
    const dbWritable = isDbWritable();
    res.json({
      status: dbWritable ? "ok" : "degraded",
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      db_writable: dbWritable,
      agent_provider: deps.agentProvider,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(
    limiter(globalLimit, `Rate limit exceeded: ${globalLimit} requests/minute`),
    createRouter(deps.service, limiter(tradeLimit, `Trade rate limit exceeded: ${tradeLimit} submissions/minute`)),
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });
  app.use(errorHandler);

  return app;
}

export function startRestServer(deps: AppDeps): Promise<Server> {
  return new Promise((resolve) => {
    const app = createApp(deps);
    const httpServer = app.listen(config.rest.port, () => {
      logRest.info({ port: config.rest.port, agent: deps.agentProvider }, "REST server listening");
      resolve(httpServer);
    });
  });
}
