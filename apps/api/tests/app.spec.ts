// ═══════════════════════════════════════════════════════════════
// @edgeline/api — HTTP surface tests (fastify.inject)
// ═══════════════════════════════════════════════════════════════

import { describe, it, expect } from "vitest";
import { CycleStatus, CycleSummarySchema, ReasonCode, RejectReason } from "@edgeline/contracts";
import type { CycleSummary } from "@edgeline/contracts";
import { PersistenceError } from "@edgeline/core";
import { InMemoryPersistenceStore } from "@edgeline/adapters";
import { buildServer } from "../src/app";
import { makePipeline } from "./helpers";

const FIRST_ID = "00000000-0000-4000-8000-000000000001";

async function setup(store?: InMemoryPersistenceStore) {
  const pipeline = makePipeline(store);
  const app = await buildServer(pipeline, { startedAtMs: Date.now() - 5_000 });
  return { app, ...pipeline };
}

class FailingCycleStore extends InMemoryPersistenceStore {
  override async recordCycle(_summary: CycleSummary): Promise<void> {
    throw new PersistenceError("disk full");
  }
}

// ─── Health ─────────────────────────────────────────────────────

describe("GET /health", () => {
  it("reports ok and uptime in seconds", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: "ok", uptime_s: 5 });
    await app.close();
  });
});

// ─── Cycles ─────────────────────────────────────────────────────

describe("POST /cycles", () => {
  it("starts a cycle and answers 202 before it finishes", async () => {
    const { app, coordinator } = await setup();

    const response = await app.inject({
      method: "POST",
      url: "/cycles",
      payload: { marketLimit: 2, autoCommit: true },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ cycle_id: FIRST_ID, status: "STARTED" });

    await coordinator.drain();
    const read = await app.inject({ method: "GET", url: `/cycles/${FIRST_ID}` });
    expect(read.statusCode).toBe(200);
    const summary = CycleSummarySchema.parse(read.json());
    expect(summary).toMatchObject({
      cycle_id: FIRST_ID,
      status: CycleStatus.COMPLETED,
      auto_signals: true,
      auto_commit: true,
      markets_requested: 2,
      markets_evaluated: 2,
      signals_created: 1,
      trades_created: 1,
      timed_out: 0,
      failed: 0,
      failures: [],
    });
    expect(summary.rejections[RejectReason.EDGE_TOO_SMALL]).toBe(1);
    await app.close();
  });

  it("accepts an empty body and applies defaults", async () => {
    const { app, coordinator, store } = await setup();

    const response = await app.inject({ method: "POST", url: "/cycles" });
    expect(response.statusCode).toBe(202);

    await coordinator.drain();
    const summary = await store.getCycle(FIRST_ID);
    expect(summary).toMatchObject({ auto_signals: true, auto_commit: false, trades_created: 0, signals_created: 1 });
    await app.close();
  });

  it("rejects a body with the wrong types", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "POST", url: "/cycles", payload: { marketLimit: "ten" } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: "Bad Request",
      message: "marketLimit: Expected number, received string",
      reason_code: ReasonCode.INPUT_INVALID,
    });
    await app.close();
  });

  it("rejects unknown fields", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "POST", url: "/cycles", payload: { limit: 5 } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ message: "body: Unrecognized key(s) in object: 'limit'" });
    await app.close();
  });

  it("rejects a market limit out of range", async () => {
    const { app, coordinator } = await setup();

    const response = await app.inject({ method: "POST", url: "/cycles", payload: { marketLimit: 0 } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ reason_code: ReasonCode.INPUT_INVALID });
    expect(coordinator.runningCycles).toBe(0);
    await app.close();
  });

  it("answers 500 with the reason code when the cycle cannot be recorded", async () => {
    const { app } = await setup(new FailingCycleStore());

    const response = await app.inject({ method: "POST", url: "/cycles", payload: {} });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: "Internal Server Error",
      message: "disk full",
      reason_code: ReasonCode.PERSIST_WRITE_FAILED,
    });
    await app.close();
  });
});

describe("GET /cycles/:id", () => {
  it("answers 404 for an unknown cycle", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "GET", url: `/cycles/${FIRST_ID}` });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "Not Found", message: `Cycle ${FIRST_ID} not found` });
    await app.close();
  });
});

// ─── Portfolio ──────────────────────────────────────────────────

describe("GET /portfolio", () => {
  it("returns the starting state", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "GET", url: "/portfolio" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      cash: 10_000,
      total_exposure: 0,
      total_value: 10_000,
      ledger_state: "OPEN",
      positions: {},
      change_log_length: 0,
    });
    await app.close();
  });

  it("reflects a committed trade after a cycle", async () => {
    const { app, coordinator } = await setup();

    await app.inject({ method: "POST", url: "/cycles", payload: { autoCommit: true } });
    await coordinator.drain();
    const response = await app.inject({ method: "GET", url: "/portfolio" });

    expect(response.json()).toMatchObject({
      cash: 9500,
      total_exposure: 500,
      total_value: 10_000,
      positions: { "m-strong": { side: "YES", size: 500, entry_price: 0.4 } },
      change_log_length: 2,
    });
    await app.close();
  });
});

// ─── Reason codes ───────────────────────────────────────────────

describe("GET /reason-codes", () => {
  it("describes a known code", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "GET", url: "/reason-codes/EVAL_EDGE_TOO_SMALL" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      code: ReasonCode.EVAL_EDGE_TOO_SMALL,
      description: "Model edge over the market price is below min_edge",
    });
    await app.close();
  });

  it("answers 404 for an unknown code", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "GET", url: "/reason-codes/NOPE" });

    expect(response.statusCode).toBe(404);
    await app.close();
  });

  it("lists the whole catalog", async () => {
    const { app } = await setup();

    const response = await app.inject({ method: "GET", url: "/reason-codes" });

    expect(response.json()).toMatchObject({ [ReasonCode.CYCLE_FAILED]: "Pipeline cycle failed" });
    await app.close();
  });
});
