// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runctl/run-worker/tests/control-point-interceptor`
 * Purpose: Unit tests for the worker-side control points.
 * Scope: Uncontrolled mode, degraded store, lifecycle guards, pause/cancel decisions. Uses the in-memory backend.
 * Invariants: Store read failures never abort work; status write failures are logged, never thrown.
 * Side-effects: none
 * Links: src/interceptor/control-point-interceptor.ts
 * @internal
 */

import { StoreUnavailableError } from "@runctl/control-core";
import { MemoryControlStore } from "@runctl/control-store";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ControlPointInterceptor } from "../src/interceptor/control-point-interceptor";
import { makeItems, makeMockLogger, RUN_ID, resolved } from "./fixtures";

const UNCONTROLLED_MSG = "Run id not resolved; running in uncontrolled mode";

describe("ControlPointInterceptor", () => {
  let store: MemoryControlStore;
  let logger: ReturnType<typeof makeMockLogger>;

  beforeEach(() => {
    store = new MemoryControlStore();
    logger = makeMockLogger();
  });

  afterEach(async () => {
    await store.close();
  });

  describe("uncontrolled mode", () => {
    it("warns once when no run id was given and then does nothing", async () => {
      const interceptor = new ControlPointInterceptor({
        store,
        run: { kind: "missing" },
        logger,
      });

      await interceptor.onRunStart();
      const collected = await interceptor.onCollect(makeItems(2));
      const decision = await interceptor.beforeItem({ id: "item-1" });
      await interceptor.afterItem({ id: "item-1" });
      const status = await interceptor.onRunEnd({ failed: false });

      expect(interceptor.controlled).toBe(false);
      expect(interceptor.runId).toBeNull();
      expect(collected.map((c) => c.skip)).toEqual([null, null]);
      expect(decision).toEqual({ action: "execute", pausedMs: 0 });
      expect(status).toBe("COMPLETED");
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { reason: "no run id on the command line or in the environment" },
        UNCONTROLLED_MSG
      );
      expect(await store.listRunIds()).toEqual([]);
    });

    it("names an invalid run id in the warning", () => {
      new ControlPointInterceptor({
        store,
        run: { kind: "invalid", raw: "bad id", source: "env" },
        logger,
      });

      expect(logger.warn).toHaveBeenCalledWith(
        { reason: 'invalid run id from env: "bad id"' },
        UNCONTROLLED_MSG
      );
    });

    it("runs uncontrolled when no store is wired", () => {
      const interceptor = new ControlPointInterceptor({
        store: null,
        run: resolved(),
        logger,
      });

      expect(interceptor.controlled).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        { reason: "no control store configured" },
        UNCONTROLLED_MSG
      );
    });
  });

  describe("lifecycle", () => {
    it("moves PENDING to RUNNING at run start and to COMPLETED at run end", async () => {
      await store.setStatus(RUN_ID, "PENDING");
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      await interceptor.onRunStart();
      expect(await store.getStatus(RUN_ID)).toBe("RUNNING");

      await expect(interceptor.onRunEnd({ failed: false })).resolves.toBe("COMPLETED");
      expect(await store.getStatus(RUN_ID)).toBe("COMPLETED");
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("starts a run the orchestrator never created", async () => {
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      await interceptor.onRunStart();

      expect(await store.getStatus(RUN_ID)).toBe("RUNNING");
    });

    it("records FAILED when any item failed", async () => {
      await store.setStatus(RUN_ID, "RUNNING");
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      await expect(interceptor.onRunEnd({ failed: true })).resolves.toBe("FAILED");
      expect(await store.getStatus(RUN_ID)).toBe("FAILED");
    });

    it("logs and skips an illegal transition", async () => {
      await store.setStatus(RUN_ID, "COMPLETED");
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      await interceptor.onRunStart();

      expect(await store.getStatus(RUN_ID)).toBe("COMPLETED");
      expect(logger.warn).toHaveBeenCalledWith(
        { runId: RUN_ID, from: "COMPLETED", to: "RUNNING", controlPoint: "run-start" },
        "Illegal status transition; status left unchanged"
      );
    });

    it("logs a failed status write instead of throwing", async () => {
      await store.setStatus(RUN_ID, "RUNNING");
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });
      vi.spyOn(store, "setStatus").mockRejectedValue(
        new StoreUnavailableError("setStatus", new Error("disk full"))
      );

      await expect(interceptor.onRunEnd({ failed: false })).resolves.toBe("COMPLETED");
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ runId: RUN_ID, status: "COMPLETED", controlPoint: "run-end" }),
        "Control store unavailable; run status not recorded"
      );
    });
  });

  describe("cancel and pause", () => {
    it("marks every item skipped when cancelled before collection", async () => {
      await store.setFlag(RUN_ID, "cancelled", true);
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      const collected = await interceptor.onCollect(makeItems(3));

      expect(collected.map((c) => [c.item.id, c.skip])).toEqual([
        ["item-1", "cancelled"],
        ["item-2", "cancelled"],
        ["item-3", "cancelled"],
      ]);
    });

    it("skips an item once cancelled", async () => {
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });
      await store.setFlag(RUN_ID, "cancelled", true);

      await expect(interceptor.beforeItem({ id: "item-3" })).resolves.toEqual({
        action: "skip",
        reason: "cancelled",
      });
    });

    it("waits out a pause before executing", async () => {
      await store.setFlag(RUN_ID, "paused", true);
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      const decision = interceptor.beforeItem({ id: "item-1" });
      setTimeout(() => {
        void store.setFlag(RUN_ID, "paused", false);
      }, 50);

      const result = await decision;
      expect(result.action).toBe("execute");
      expect(result.action === "execute" && result.pausedMs).toBeGreaterThanOrEqual(40);
    });

    it("skips instead of executing when cancelled during a pause", async () => {
      await store.setFlag(RUN_ID, "paused", true);
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      const decision = interceptor.beforeItem({ id: "item-1" });
      setTimeout(() => {
        void store.setFlag(RUN_ID, "cancelled", true);
      }, 20);

      await expect(decision).resolves.toEqual({ action: "skip", reason: "cancelled" });
      expect(await store.checkFlag(RUN_ID, "paused")).toBe(true);
    });

    it("reports cancellation observed after an item", async () => {
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });

      await expect(interceptor.afterItem({ id: "item-1" })).resolves.toEqual({
        cancelDetected: false,
      });
      await store.setFlag(RUN_ID, "cancelled", true);
      await expect(interceptor.afterItem({ id: "item-2" })).resolves.toEqual({
        cancelDetected: true,
      });
    });
  });

  describe("degraded store", () => {
    it("treats an unavailable store as no signal", async () => {
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });
      vi.spyOn(store, "checkFlag").mockRejectedValue(
        new StoreUnavailableError("checkFlag", new Error("unreachable"))
      );

      await expect(interceptor.beforeItem({ id: "item-1" })).resolves.toEqual({
        action: "execute",
        pausedMs: 0,
      });
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ runId: RUN_ID, flag: "cancelled", controlPoint: "before-item" }),
        "Control store unavailable; assuming no control signal"
      );
    });

    it("proceeds when the store fails during a pause", async () => {
      await store.setFlag(RUN_ID, "paused", true);
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });
      vi.spyOn(store, "waitForFlag").mockRejectedValue(
        new StoreUnavailableError("waitForFlag", new Error("unreachable"))
      );

      const result = await interceptor.beforeItem({ id: "item-1" });

      expect(result.action).toBe("execute");
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ itemId: "item-1" }),
        "Control store unavailable during pause; proceeding"
      );
    });

    it("rethrows errors that are not store outages", async () => {
      const interceptor = new ControlPointInterceptor({ store, run: resolved(), logger });
      vi.spyOn(store, "checkFlag").mockRejectedValue(new Error("programming error"));

      await expect(interceptor.beforeItem({ id: "item-1" })).rejects.toThrow(
        "programming error"
      );
    });
  });
});
