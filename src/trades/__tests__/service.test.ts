import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { ZodError } from "zod";
import { cleanDb } from "../../../test/helpers.js";
import { fundOutput, stockResult } from "../../../test/fixtures.js";
import { getDb } from "../../db/database.js";
import { AuthError, CollaboratorUnavailableError, DuplicateUserError, NotFoundError, ValidationError } from "../../errors.js";
import type { FundRunner } from "../../pipeline/fund-runner.js";
import type { AutoHedgeOutput, FundTask } from "../../pipeline/types.js";
import { createTradeService, hashApiKey, type TradeService } from "../service.js";
import { sqliteTradeStore } from "../store.js";

const START = Date.parse("2026-03-01T12:00:00.000Z");

const SUBMISSION = {
  stocks: ["nvda", "AMD", "NVDA"],
  task: "Find long entries in semiconductors",
  allocation: 20_000,
  risk_level: 6,
};

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("trade service", () => {
  let clock: number;
  let run: Mock<(task: FundTask) => Promise<AutoHedgeOutput>>;
  let service: TradeService;

  function register(username: string) {
    return service.registerUser({ username, email: `${username}@example.com`, fund_name: `${username} fund` });
  }

  beforeEach(() => {
    cleanDb(getDb());
    clock = START;
    run = vi.fn(async (task: FundTask) => fundOutput(task.stocks.map((s) => stockResult(s, "completed"))));
    const fundRunner: FundRunner = { run };
    service = createTradeService({
      store: sqliteTradeStore,
      fundRunner,
      analyticsTtlMs: 60_000,
      analyticsDefaultDays: 30,
      now: () => clock++,
    });
  });

  describe("users and keys", () => {
    it("registers a user and authenticates with the returned key", () => {
      const { user, api_key } = register("alice");

      expect(api_key).toMatch(/^hd_[A-Za-z0-9_-]{32}$/);
      expect(service.authenticate(api_key)).toEqual(user);
      expect(user).toMatchObject({ username: "alice", email: "alice@example.com", fund_description: "" });
    });

    it("stores only the hash of the key", () => {
      const { api_key } = register("alice");
      const rows = getDb().prepare("SELECT key_hash FROM api_keys").all();
      expect(rows).toEqual([{ key_hash: hashApiKey(api_key) }]);
    });

    it("rejects a duplicate username or email", () => {
      register("alice");
      expect(() => register("alice")).toThrow(DuplicateUserError);
      expect(() =>
        service.registerUser({ username: "alice2", email: "ALICE@example.com", fund_name: "Other" }),
      ).toThrow("Email alice@example.com is already registered");
    });

    it("rejects missing and unknown keys", () => {
      expect(() => service.authenticate(undefined)).toThrow(new AuthError("Missing API key"));
      expect(() => service.authenticate("hd_not-a-real-key")).toThrow("Invalid or revoked API key");
    });

    it("rotating a key revokes the old one for good", () => {
      const { user, api_key } = register("alice");
      const fresh = service.rotateApiKey(user, api_key);

      expect(fresh).not.toBe(api_key);
      expect(service.authenticate(fresh).id).toBe(user.id);
      expect(() => service.authenticate(api_key)).toThrow(AuthError);
      expect(() => service.rotateApiKey(user, api_key)).toThrow(AuthError);
    });

    it("updates profile fields", () => {
      const { user, api_key } = register("alice");
      const updated = service.updateUser(user, { fund_description: "Semis only" });

      expect(updated.fund_description).toBe("Semis only");
      expect(service.authenticate(api_key).fund_description).toBe("Semis only");
      expect(() => service.updateUser(user, {})).toThrow(ValidationError);
    });
  });

  describe("trades", () => {
    it("submits in pending and completes in the background", async () => {
      const { user } = register("alice");
      const ack = service.submitTrade(user, SUBMISSION);

      expect(ack.status).toBe("pending");
      await service.drain();

      const trade = service.getTrade(user, ack.id);
      expect(trade.status).toBe("completed");
      expect(trade.stocks).toEqual(["NVDA", "AMD"]);
      expect(trade.result?.results.map((r) => r.stock)).toEqual(["NVDA", "AMD"]);
      expect(trade.executed_at).not.toBeNull();
      expect(trade.error).toBeNull();
      expect(run).toHaveBeenCalledWith({
        name: "alice fund",
        description: "",
        stocks: ["NVDA", "AMD"],
        task: "Find long entries in semiconductors",
        allocation: 20_000,
        risk_level: 6,
        strategy_type: null,
      });
    });

    it("marks the trade failed when a collaborator is unavailable", async () => {
      run.mockRejectedValueOnce(new CollaboratorUnavailableError("OPENAI_API_KEY not configured for openai"));
      const { user } = register("alice");
      const { id } = service.submitTrade(user, SUBMISSION);
      await service.drain();

      expect(service.getTrade(user, id)).toMatchObject({
        status: "failed",
        result: null,
        error: "OPENAI_API_KEY not configured for openai",
      });
    });

    it("rejects invalid submissions with ValidationError", () => {
      const { user } = register("alice");
      expect(() => service.submitTrade(user, { ...SUBMISSION, stocks: [] })).toThrow(ValidationError);
      expect(() => service.submitTrade(user, { ...SUBMISSION, allocation: 0 })).toThrow(ValidationError);
      expect(() => service.submitTrade(user, { ...SUBMISSION, risk_level: 11 })).toThrow(ValidationError);
      expect(() => service.submitTrade(user, { ...SUBMISSION, task: "short" })).toThrow(ValidationError);
      expect(run).not.toHaveBeenCalled();
    });

    it("discards a completion for a trade deleted mid-flight", async () => {
      const gate = deferred<AutoHedgeOutput>();
      run.mockReturnValueOnce(gate.promise);
      const { user } = register("alice");
      const { id } = service.submitTrade(user, SUBMISSION);

      service.deleteTrade(user, id);
      gate.resolve(fundOutput([stockResult("NVDA", "completed")]));
      await service.drain();

      expect(() => service.getTrade(user, id)).toThrow(NotFoundError);
      expect(getDb().prepare("SELECT COUNT(*) AS n FROM trade_results").get()).toEqual({ n: 0 });
    });

    it("refuses a stored result that does not match the output shape", async () => {
      const { user } = register("alice");
      const { id } = service.submitTrade(user, SUBMISSION);
      await service.drain();
      getDb().prepare("UPDATE trade_results SET output = ? WHERE trade_id = ?").run('{"results":"garbled"}', id);

      expect(() => sqliteTradeStore.getTrade(id)).toThrow(ZodError);
    });

    it("hides another user's trade behind the same NotFoundError", async () => {
      const alice = register("alice").user;
      const bob = register("bob").user;
      const { id } = service.submitTrade(alice, SUBMISSION);
      await service.drain();

      expect(() => service.getTrade(bob, id)).toThrow(new NotFoundError(`Trade ${id} not found`));
      expect(() => service.deleteTrade(bob, id)).toThrow(new NotFoundError(`Trade ${id} not found`));
      expect(service.getTrade(alice, id).id).toBe(id);
    });

    it("deleting twice yields NotFoundError the second time", async () => {
      const { user } = register("alice");
      const { id } = service.submitTrade(user, SUBMISSION);
      await service.drain();

      service.deleteTrade(user, id);
      expect(() => service.deleteTrade(user, id)).toThrow(new NotFoundError(`Trade ${id} not found`));
      expect(() => service.deleteTrade(user, "never-existed")).toThrow(NotFoundError);
    });

    it("lists newest first with status filter and paging", async () => {
      const { user } = register("alice");
      const first = service.submitTrade(user, SUBMISSION).id;
      await service.drain();
      run.mockRejectedValueOnce(new Error("boom"));
      const second = service.submitTrade(user, SUBMISSION).id;
      await service.drain();
      const third = service.submitTrade(user, SUBMISSION).id;
      await service.drain();

      expect(service.listTrades(user, {}).map((t) => t.id)).toEqual([third, second, first]);
      expect(service.listTrades(user, { status: "failed" }).map((t) => t.id)).toEqual([second]);
      expect(service.listTrades(user, { limit: "1", skip: "1" }).map((t) => t.id)).toEqual([second]);
      expect(() => service.listTrades(user, { limit: "0" })).toThrow(ValidationError);
    });
  });

  describe("analytics", () => {
    it("aggregates the caller's window and refreshes after a write", async () => {
      const alice = register("alice").user;
      const bob = register("bob").user;
      service.submitTrade(alice, SUBMISSION);
      service.submitTrade(bob, { ...SUBMISSION, allocation: 999 });
      await service.drain();

      const before = service.getHistoricalAnalytics(alice, {});
      expect(before).toMatchObject({ days: 30, total_trades: 1, completed_trades: 1, total_allocation: 20_000, approved: 2 });
      expect(service.getHistoricalAnalytics(alice, {})).toBe(before);

      service.submitTrade(alice, SUBMISSION);
      await service.drain();
      expect(service.getHistoricalAnalytics(alice, {}).total_trades).toBe(2);
    });

    it("excludes trades older than the window", async () => {
      const { user } = register("alice");
      service.submitTrade(user, SUBMISSION);
      await service.drain();
      clock += 3 * 86_400_000;

      expect(service.getHistoricalAnalytics(user, { days: "2" }).total_trades).toBe(0);
      expect(service.getHistoricalAnalytics(user, { days: "5" }).total_trades).toBe(1);
      expect(() => service.getHistoricalAnalytics(user, { days: "0" })).toThrow(ValidationError);
    });
  });
});
