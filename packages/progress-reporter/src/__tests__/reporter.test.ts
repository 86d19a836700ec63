/**
 * Tests for ProgressReporter
 */

import { describe, it, expect, vi } from "vitest";
import { createEvent, createSupervisor, humanMessage } from "@switchboard/supervisor-core";
import { finishWith, handoffTo, makeMockLogger, scriptedSupervisor, scriptedWorker } from "@switchboard/supervisor-core/testing";
import { ProgressReporter } from "../reporter.js";
import type { ProgressEvent } from "../types.js";

describe("ProgressReporter", () => {
  describe("Event mapping", () => {
    it("should emit run_started event", () => {
      const events: ProgressEvent[] = [];
      const logger = makeMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.handle(
        createEvent("run:start", "run-1", { inputCount: 1, supervisor: "supervisor", workers: ["math_expert", "research_expert"] })
      );

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: "run_started",
        runId: "run-1",
        data: { supervisor: "supervisor", workers: ["math_expert", "research_expert"] },
      });
      expect(logger.info).toHaveBeenCalledWith(
        "🎯 Run started: supervisor with 2 worker(s) (math_expert, research_expert)"
      );
    });

    it("should report steps with 1-based numbering", () => {
      const events: ProgressEvent[] = [];
      const logger = makeMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.handle(createEvent("step:start", "run-1", { agent: "math_expert", role: "worker", stepCount: 1 }));
      reporter.handle(
        createEvent("step:end", "run-1", { agent: "math_expert", role: "worker", stepCount: 2, turnCount: 3, durationMs: 40 })
      );

      expect(events.map((e) => e.type)).toEqual(["agent_started", "agent_completed"]);
      expect(events[0]?.data).toEqual({ agent: "math_expert", role: "worker", step: 2 });
      expect(events[1]?.data).toEqual({ agent: "math_expert", role: "worker", step: 2, turnCount: 3, durationMs: 40 });
      expect(logger.info).toHaveBeenCalledWith("🛠️ [2] math_expert working...");
      expect(logger.debug).toHaveBeenCalledWith("✅ [2] math_expert done: 3 turn(s) in 40ms");
    });

    it("should report handoffs in both directions", () => {
      const events: ProgressEvent[] = [];
      const logger = makeMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.handle(
        createEvent("handoff", "run-1", {
          record: { from: "supervisor", to: "math_expert", reason: "transfer_to_math_expert", sequenceIndex: 1 },
        })
      );
      reporter.handle(createEvent("handoff:back", "run-1", { from: "math_expert", to: "supervisor" }));

      expect(events[0]?.data).toEqual({ from: "supervisor", to: "math_expert", reason: "transfer_to_math_expert" });
      expect(events[1]).toMatchObject({ type: "handoff_back", data: { from: "math_expert", to: "supervisor" } });
      expect(logger.info).toHaveBeenCalledWith("➡️  supervisor → math_expert: transfer_to_math_expert");
      expect(logger.info).toHaveBeenCalledWith("↩️  math_expert → supervisor");
    });

    it("should ignore phase and aggregate events", () => {
      const events: ProgressEvent[] = [];
      const reporter = new ProgressReporter(makeMockLogger(), (e) => events.push(e));

      reporter.handle(createEvent("phase", "run-1", { from: "awaiting_decision", to: "dispatched" }));
      reporter.handle(createEvent("aggregate", "run-1", { agent: "math_expert", produced: 2, kept: 1 }));

      expect(events).toEqual([]);
    });
  });

  describe("Run completion", () => {
    it("should log success", () => {
      const logger = makeMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.handle(
        createEvent("run:end", "run-1", { status: "completed", stepCount: 3, messageCount: 5, durationMs: 1500 })
      );

      expect(logger.info).toHaveBeenCalledWith("✅ Run completed: 3 step(s), 5 message(s) in 1.5s");
      expect(reporter.getEvents()[0]?.data).toEqual({
        status: "completed",
        steps: 3,
        messages: 5,
        totalDuration: 1500,
        error: undefined,
      });
    });

    it("should warn on cancellation", () => {
      const logger = makeMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.handle(
        createEvent("run:end", "run-1", { status: "cancelled", stepCount: 1, messageCount: 2, durationMs: 20 })
      );

      expect(logger.warn).toHaveBeenCalledWith("⏹️  Run cancelled: 1 step(s), 2 message(s) in 0.0s");
    });

    it("should log failures with the error", () => {
      const logger = makeMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.handle(
        createEvent("run:end", "run-1", {
          status: "failed",
          stepCount: 1,
          messageCount: 1,
          durationMs: 5,
          error: "Iteration limit of 1 steps exceeded",
        })
      );

      expect(logger.error).toHaveBeenCalledWith("❌ Run failed: Iteration limit of 1 steps exceeded");
    });
  });

  describe("Event history", () => {
    it("should keep and clear history", () => {
      const reporter = new ProgressReporter(makeMockLogger());
      reporter.handle(createEvent("handoff:back", "run-1", { from: "math_expert", to: "supervisor" }));

      expect(reporter.getEvents()).toHaveLength(1);

      reporter.clear();
      expect(reporter.getEvents()).toHaveLength(0);
    });

    it("should work without a callback", () => {
      const reporter = new ProgressReporter(makeMockLogger());

      expect(() =>
        reporter.handle(createEvent("step:start", "run-1", { agent: "supervisor", role: "supervisor", stepCount: 0 }))
      ).not.toThrow();
    });
  });

  describe("Integration", () => {
    it("should follow a whole run as an observer", async () => {
      const onProgress = vi.fn();
      const reporter = new ProgressReporter(makeMockLogger(), onProgress);
      const workflow = createSupervisor({
        supervisor: { instruction: "Route", step: scriptedSupervisor([handoffTo("math_expert"), finishWith("5")]) },
        agents: [{ name: "math_expert", instruction: "Compute", step: scriptedWorker("5") }],
      }).compile();

      await workflow.invoke([humanMessage("2 + 3?")], { observers: [reporter.observer] });

      expect(reporter.getEvents().map((e) => e.type)).toEqual([
        "run_started",
        "agent_started",
        "agent_completed",
        "handoff",
        "agent_started",
        "agent_completed",
        "handoff_back",
        "agent_started",
        "agent_completed",
        "run_completed",
      ]);
      expect(onProgress).toHaveBeenCalledTimes(10);
    });
  });
});
