import { createHash, randomBytes, randomUUID } from "node:crypto";
import { AuthError, DuplicateUserError, NotFoundError, errorMessage } from "../errors.js";
import { logTrades } from "../logging.js";
import type { FundRunner } from "../pipeline/fund-runner.js";
import type { FundTask } from "../pipeline/types.js";
import { AnalyticsCache, computeAnalytics } from "./analytics.js";
import {
  AnalyticsQuerySchema,
  ListTradesQuerySchema,
  TradingTaskSchema,
  UserCreateSchema,
  UserUpdateSchema,
  parseOrThrow,
} from "./schema.js";
import type { TradeStore } from "./store.js";
import type { HistoricalAnalytics, Trade, TradeRecord, TradeStatus, User } from "./types.js";

const DAY_MS = 86_400_000;

export interface TradeServiceDeps {
  store: TradeStore;
  fundRunner: FundRunner;
  analyticsTtlMs: number;
  analyticsDefaultDays: number;
  now?: () => number;
}

export interface Registration {
  user: User;
  api_key: string;
}

export interface TradeService {
  registerUser(input: unknown): Registration;
  authenticate(apiKey: string | undefined): User;
  updateUser(user: User, input: unknown): User;
  rotateApiKey(user: User, presentedKey: string): string;
  submitTrade(user: User, input: unknown): { id: string; status: TradeStatus };
  listTrades(user: User, query: unknown): Trade[];
  getTrade(user: User, id: string): Trade;
  deleteTrade(user: User, id: string): void;
  getHistoricalAnalytics(user: User, query: unknown): HistoricalAnalytics;
  /** Resolves once every background trade run has settled. */
  drain(): Promise<void>;
}

export function hashApiKey(key: string): string {
  return createHash("sha256").update(key).digest("hex");
}

function generateApiKey(): string {
  return `hd_${randomBytes(24).toString("base64url")}`;
}

function toTrade(r: TradeRecord): Trade {
  return {
    id: r.id,
    user_id: r.user_id,
    stocks: r.stocks,
    task: r.task,
    allocation: r.allocation,
    strategy_type: r.strategy_type,
    risk_level: r.risk_level,
    status: r.status,
    created_at: r.created_at,
    executed_at: r.executed_at,
    error: r.error,
    result: r.result,
  };
}

function isUniqueViolation(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "SQLITE_CONSTRAINT_UNIQUE";
}

export function createTradeService(deps: TradeServiceDeps): TradeService {
  const { store, fundRunner } = deps;
  const now = deps.now ?? Date.now;
  const cache = new AnalyticsCache(deps.analyticsTtlMs, now);
  const inFlight = new Set<Promise<void>>();
  const iso = () => new Date(now()).toISOString();

  function notFound(id: string): NotFoundError {
    return new NotFoundError(`Trade ${id} not found`);
  }

  /** Replace `next` against `expectedVersion`; false means deleted or changed underneath. */
  function commit(next: Trade, expectedVersion: number): boolean {
    const ok = store.replaceTrade(next, expectedVersion);
    if (ok) cache.invalidate(next.user_id);
    return ok;
  }

  async function execute(user: User, pending: TradeRecord): Promise<void> {
    const log = logTrades.child({ tradeId: pending.id });
    const running: Trade = { ...toTrade(pending), status: "running" };
    if (!commit(running, pending.version)) {
      log.info("Trade removed before it started, skipping run");
      return;
    }

    const task: FundTask = {
      name: user.fund_name,
      description: user.fund_description,
      stocks: running.stocks,
      task: running.task,
      allocation: running.allocation,
      risk_level: running.risk_level,
      strategy_type: running.strategy_type,
    };

    let finished: Trade;
    try {
      const result = await fundRunner.run(task);
      finished = { ...running, status: "completed", result, executed_at: iso(), error: null };
    } catch (e: unknown) {
      log.warn({ err: errorMessage(e) }, "Fund run could not complete");
      finished = { ...running, status: "failed", result: null, executed_at: iso(), error: errorMessage(e) };
    }

    if (commit(finished, pending.version + 1)) {
      log.info({ status: finished.status }, `Trade ${finished.status}`);
    } else {
      log.info({ status: finished.status }, "Trade deleted while running, result discarded");
    }
  }

  return {
    registerUser(input) {
      const data = parseOrThrow(UserCreateSchema, input);
      if (store.findUserByUsername(data.username)) {
        throw new DuplicateUserError(`Username ${data.username} is already registered`);
      }
      if (store.findUserByEmail(data.email)) {
        throw new DuplicateUserError(`Email ${data.email} is already registered`);
      }

      const user: User = { id: randomUUID(), ...data, created_at: iso() };
      const apiKey = generateApiKey();
      try {
        store.createUser(user, hashApiKey(apiKey));
      } catch (e: unknown) {
        if (isUniqueViolation(e)) throw new DuplicateUserError("Username or email is already registered", { cause: e });
        throw e;
      }
      logTrades.info({ userId: user.id, username: user.username }, "User registered");
      return { user, api_key: apiKey };
    },

    authenticate(apiKey) {
      if (!apiKey) throw new AuthError("Missing API key");
      const entry = store.getApiKey(hashApiKey(apiKey));
      if (!entry || entry.revoked) throw new AuthError("Invalid or revoked API key");
      const user = store.getUser(entry.userId);
      if (!user) throw new AuthError("Invalid or revoked API key");
      return user;
    },

    updateUser(user, input) {
      const patch = parseOrThrow(UserUpdateSchema, input);
      if (patch.email && patch.email !== user.email) {
        const holder = store.findUserByEmail(patch.email);
        if (holder && holder.id !== user.id) {
          throw new DuplicateUserError(`Email ${patch.email} is already registered`);
        }
      }
      const next: User = {
        ...user,
        email: patch.email ?? user.email,
        fund_name: patch.fund_name ?? user.fund_name,
        fund_description: patch.fund_description ?? user.fund_description,
      };
      if (!store.saveUser(next)) throw new AuthError("User no longer exists");
      return next;
    },

    rotateApiKey(user, presentedKey) {
      const fresh = generateApiKey();
      if (!store.rotateApiKey(hashApiKey(presentedKey), hashApiKey(fresh), user.id)) {
        throw new AuthError("Invalid or revoked API key");
      }
      logTrades.info({ userId: user.id }, "API key rotated");
      return fresh;
    },

    submitTrade(user, input) {
      const data = parseOrThrow(TradingTaskSchema, input);
      const record = store.insertTrade({
        id: randomUUID(),
        user_id: user.id,
        stocks: data.stocks,
        task: data.task,
        allocation: data.allocation,
        strategy_type: data.strategy_type,
        risk_level: data.risk_level,
        status: "pending",
        created_at: iso(),
        executed_at: null,
        error: null,
        result: null,
      });
      cache.invalidate(user.id);
      logTrades.info({ tradeId: record.id, stocks: record.stocks }, "Trade submitted");

      const job: Promise<void> = execute(user, record)
        .catch((e: unknown) => {
          logTrades.error({ tradeId: record.id, err: errorMessage(e) }, "Background trade run crashed");
        })
        .finally(() => {
          inFlight.delete(job);
        });
      inFlight.add(job);

      return { id: record.id, status: "pending" };
    },

    listTrades(user, query) {
      const q = parseOrThrow(ListTradesQuerySchema, query);
      return store.listTrades(user.id, q).map(toTrade);
    },

    getTrade(user, id) {
      const record = store.getTrade(id);
      if (!record || record.user_id !== user.id) throw notFound(id);
      return toTrade(record);
    },

    deleteTrade(user, id) {
      if (!store.deleteTrade(id, user.id)) throw notFound(id);
      cache.invalidate(user.id);
      logTrades.info({ tradeId: id }, "Trade deleted");
    },

    getHistoricalAnalytics(user, query) {
      const days = parseOrThrow(AnalyticsQuerySchema, query).days ?? deps.analyticsDefaultDays;
      const cached = cache.get(user.id, days);
      if (cached) return cached;

      const since = new Date(now() - days * DAY_MS).toISOString();
      const analytics = computeAnalytics(store.tradesSince(user.id, since).map(toTrade), days);
      cache.set(user.id, days, analytics);
      return analytics;
    },

    async drain() {
      while (inFlight.size > 0) {
        await Promise.allSettled([...inFlight]);
      }
    },
  };
}
