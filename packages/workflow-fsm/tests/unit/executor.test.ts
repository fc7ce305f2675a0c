/**
 * Unit tests for the transition executor: routine order, halting, resolution
 * failures and routine errors.
 */
import { describe, it, expect, beforeEach } from "vitest";
import { createMockLogger, type MockLogger } from "@waypoint/workflow-core";
import {
  createWorkflow,
  bindWorkflow,
  defineWorkflow,
  SpecificationError,
  UndefinedTransitionError,
  UnresolvedTargetError,
  WorkflowHaltedError,
  resolveTransition,
  type SpecificationRegistry,
} from "../../src/index.js";
import { createHookRecorder, type HookRecorder } from "../../src/testing/index.js";
import { createArticle, createTestRegistry, defineReviewWorkflow } from "../fixtures/review.js";

describe("executeTransition", () => {
  let registry: SpecificationRegistry;
  let recorder: HookRecorder;
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
    registry = createTestRegistry({ logger });
    recorder = createHookRecorder();
  });

  function defineOrdering() {
    return defineWorkflow(
      "Ordering",
      (w) => {
        w.state("first", (s) => {
          s.event("go", "second", { action: recorder.action("action") });
          s.onExit(recorder.hook("exit first"));
        });
        w.state("second", (s) => {
          s.onEntry(recorder.hook("entry second"));
        });
        w.onTransition(recorder.hook("transition 1"));
        w.onTransition(recorder.hook("transition 2"));
      },
      { registry }
    );
  }

  describe("routine order", () => {
    it("fires action, transition hooks, exit, then entry", () => {
      const workflow = createWorkflow(defineOrdering());

      const outcome = workflow.fire("go");

      expect(outcome).toEqual({
        ok: true,
        status: "transitioned",
        event: "go",
        from: "first",
        to: "second",
      });
      expect(recorder.log).toEqual([
        "action",
        "transition 1",
        "transition 2",
        "exit first",
        "entry second",
      ]);
    });

    it("changes the state between on_exit and on_entry", () => {
      const workflow = createWorkflow(defineOrdering());

      workflow.fire("go");

      expect(recorder.calls.map((call) => call.stateDuringCall)).toEqual([
        "first",
        "first",
        "first",
        "first",
        "second",
      ]);
      expect(workflow.currentState).toBe("second");
    });

    it("gives every routine the same from, to and event", () => {
      const workflow = createWorkflow(defineOrdering());

      workflow.fire("go");

      for (const call of recorder.calls) {
        expect(call).toMatchObject({ event: "go", from: "first", to: "second" });
      }
    });

    it("passes fire arguments by identity", () => {
      const workflow = createWorkflow(defineOrdering());
      const payload = { note: "looks good" };

      workflow.fire("go", payload, 42);

      const [first, ...rest] = recorder.calls;
      expect(first?.args).toEqual([payload, 42]);
      expect(first?.args[0]).toBe(payload);
      for (const call of rest) {
        expect(call.args).toBe(first?.args);
      }
    });

    it("fires exit and entry hooks of the same state on a self-transition", () => {
      const spec = defineWorkflow(
        "Loop",
        (w) => {
          w.state("open", (s) => {
            s.event("poke", "open");
            s.onExit(recorder.hook("exit open"));
            s.onEntry(recorder.hook("entry open"));
          });
        },
        { registry }
      );
      const workflow = createWorkflow(spec);

      const outcome = workflow.fire("poke");

      expect(outcome.ok).toBe(true);
      expect(recorder.log).toEqual(["exit open", "entry open"]);
      expect(workflow.currentState).toBe("open");
    });

    it("does not fire the initial state's on_entry when an instance is created", () => {
      const spec = defineWorkflow(
        "Quiet",
        (w) => {
          w.state("start", (s) => {
            s.onEntry(recorder.hook("entry start"));
          });
        },
        { registry }
      );

      createWorkflow(spec);

      expect(recorder.log).toEqual([]);
    });

    it("exposes the host to routines", () => {
      const seen: string[] = [];
      const spec = defineReviewWorkflow(registry, ({ host }) => {
        seen.push(host.title);
      });
      const article = createArticle("Routing tables");
      const workflow = bindWorkflow(article, spec, { initialState: "being_reviewed" });

      workflow.fire("accept");

      expect(seen).toEqual(["Routing tables"]);
    });
  });

  describe("halting", () => {
    it("returns a halted outcome and keeps the state", () => {
      const spec = defineReviewWorkflow(registry, ({ halt }) => halt("coz I said so!"));
      const workflow = bindWorkflow(createArticle(), spec, { initialState: "being_reviewed" });

      const outcome = workflow.fire("accept");

      expect(outcome).toEqual({
        ok: false,
        status: "halted",
        event: "accept",
        state: "being_reviewed",
        reason: "coz I said so!",
      });
      expect(workflow.halted).toBe(true);
      expect(workflow.haltedBecause).toBe("coz I said so!");
      expect(workflow.currentState).toBe("being_reviewed");
    });

    it("records a halt without a reason", () => {
      const spec = defineReviewWorkflow(registry, ({ halt }) => halt());
      const workflow = bindWorkflow(createArticle(), spec, { initialState: "being_reviewed" });

      const outcome = workflow.fire("accept");

      expect(outcome.ok).toBe(false);
      expect(workflow.halted).toBe(true);
      expect(workflow.haltedBecause).toBeUndefined();
    });

    it("leaves the action at the halt call", () => {
      let reached = false;
      const spec = defineReviewWorkflow(registry, (ctx) => {
        if (ctx.host.reviewer === null) ctx.halt("no reviewer");
        reached = true;
      });
      const workflow = bindWorkflow(createArticle(), spec, { initialState: "being_reviewed" });

      workflow.fire("accept");

      expect(reached).toBe(false);
    });

    it("fires no hooks after a halt", () => {
      const spec = defineWorkflow(
        "Halting",
        (w) => {
          w.state("a", (s) => {
            s.event("go", "b", { action: recorder.action("action", ({ halt }) => halt("stop")) });
            s.onExit(recorder.hook("exit a"));
          });
          w.state("b", (s) => {
            s.onEntry(recorder.hook("entry b"));
          });
          w.onTransition(recorder.hook("transition"));
        },
        { registry }
      );
      const workflow = createWorkflow(spec);

      workflow.fire("go");

      expect(recorder.log).toEqual(["action"]);
      expect(workflow.currentState).toBe("a");
    });

    it("clears the halt status on the next attempt", () => {
      const article = createArticle();
      const spec = defineReviewWorkflow(registry, ({ host, halt }) => {
        if (host.reviewer === null) halt("no reviewer");
      });
      const workflow = bindWorkflow(article, spec, { initialState: "being_reviewed" });

      workflow.fire("accept");
      expect(workflow.halted).toBe(true);

      article.reviewer = "sam";
      workflow.fire("accept");

      expect(workflow.halted).toBe(false);
      expect(workflow.haltedBecause).toBeUndefined();
      expect(workflow.currentState).toBe("accepted");
    });

    it("keeps the halt status when the next event cannot be resolved", () => {
      const spec = defineReviewWorkflow(registry, ({ halt }) => halt("not yet"));
      const workflow = bindWorkflow(createArticle(), spec, { initialState: "being_reviewed" });

      workflow.fire("accept");

      expect(() => workflow.fire("submit")).toThrow(UndefinedTransitionError);
      expect(workflow.halted).toBe(true);
      expect(workflow.haltedBecause).toBe("not yet");
    });

    it("throws WorkflowHaltedError from fireOrThrow and still records the halt", () => {
      const spec = defineReviewWorkflow(registry, ({ halt }) => halt("coz I said so!"));
      const workflow = bindWorkflow(createArticle(), spec, { initialState: "being_reviewed" });

      let caught: unknown;
      try {
        workflow.fireOrThrow("accept");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(WorkflowHaltedError);
      if (caught instanceof WorkflowHaltedError) {
        expect(caught.message).toBe(
          'Event "accept" was halted in state "being_reviewed" of workflow "Article": coz I said so!'
        );
        expect(caught.reason).toBe("coz I said so!");
        expect(caught.code).toBe("WORKFLOW_HALTED");
      }
      expect(workflow.halted).toBe(true);
      expect(workflow.currentState).toBe("being_reviewed");
    });

    it("returns the transitioned outcome from fireOrThrow", () => {
      const workflow = bindWorkflow(createArticle(), defineReviewWorkflow(registry));

      expect(workflow.fireOrThrow("submit")).toEqual({
        ok: true,
        status: "transitioned",
        event: "submit",
        from: "new",
        to: "awaiting_review",
      });
    });

    it("rejects halt calls after the action returned", () => {
      const captured: { halt?: (reason?: string) => never } = {};
      const spec = defineWorkflow(
        "Late",
        (w) => {
          w.state("a", (s) => {
            s.event("go", "b", {
              action: (ctx) => {
                captured.halt = ctx.halt;
              },
            });
          });
          w.state("b");
        },
        { registry }
      );
      const workflow = createWorkflow(spec);

      workflow.fire("go");

      let caught: unknown;
      try {
        captured.halt?.("too late");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SpecificationError);
      if (caught instanceof SpecificationError) {
        expect(caught.code).toBe("WORKFLOW_HALT_OUTSIDE_ACTION");
      }
      expect(workflow.currentState).toBe("b");
      expect(workflow.halted).toBe(false);
    });
  });

  describe("resolution failures", () => {
    it("throws UndefinedTransitionError listing the legal events", () => {
      const workflow = bindWorkflow(createArticle(), defineReviewWorkflow(registry));

      let caught: unknown;
      try {
        workflow.fire("accept");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UndefinedTransitionError);
      if (caught instanceof UndefinedTransitionError) {
        expect(caught.legalEvents).toEqual(["submit"]);
        expect(caught.state).toBe("new");
        expect(caught.event).toBe("accept");
        expect(caught.message).toBe(
          'There is no event "accept" defined for the "new" state of workflow "Article". Legal events: "submit"'
        );
      }
      expect(workflow.currentState).toBe("new");
    });

    it("reports terminal states as having no events", () => {
      const workflow = bindWorkflow(createArticle(), defineReviewWorkflow(registry), {
        initialState: "accepted",
      });

      expect(() => workflow.fire("reject")).toThrow(
        'There is no event "reject" defined for the "accepted" state of workflow "Article". No events are defined for this state'
      );
    });

    it("fires no routine for an undefined event", () => {
      const workflow = createWorkflow(defineOrdering());

      expect(() => workflow.fire("stop")).toThrow(UndefinedTransitionError);
      expect(recorder.log).toEqual([]);
    });

    it("logs undefined events with the legal events", () => {
      const workflow = createWorkflow(defineOrdering());
      logger.clear();

      expect(() => workflow.fire("stop")).toThrow(UndefinedTransitionError);

      expect(logger.getLastCallAt("WARN")).toEqual({
        level: "WARN",
        message: "Undefined transition",
        data: { workflow: "Ordering", event: "stop", from: "first", legalEvents: ["go"] },
      });
    });

    it("throws UnresolvedTargetError until the target is declared", () => {
      const spec = defineWorkflow(
        "Archive",
        (w) => {
          w.state("draft", (s) => {
            s.event("archive", "archived");
          });
        },
        { registry }
      );
      const workflow = createWorkflow(spec);

      let caught: unknown;
      try {
        workflow.fire("archive");
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnresolvedTargetError);
      if (caught instanceof UnresolvedTargetError) {
        expect(caught.target).toBe("archived");
        expect(caught.message).toBe(
          'Event "archive" of state "draft" in workflow "Archive" transitions to undeclared state "archived"'
        );
      }
      expect(workflow.currentState).toBe("draft");

      defineWorkflow("Archive", (w) => w.state("archived"), { registry });

      expect(workflow.fire("archive").ok).toBe(true);
      expect(workflow.currentState).toBe("archived");
    });

    it("resolves transitions without firing them", () => {
      const spec = defineReviewWorkflow(registry);

      const resolved = resolveTransition(spec, "being_reviewed", "reject");

      expect(resolved.source.name).toBe("being_reviewed");
      expect(resolved.event.name).toBe("reject");
      expect(resolved.target.name).toBe("rejected");
    });
  });

  describe("routine errors", () => {
    function defineFailing(stage: "action" | "transition" | "exit" | "entry") {
      const boom = (): void => {
        throw new Error(`${stage} failed`);
      };
      return defineWorkflow(
        `Failing ${stage}`,
        (w) => {
          w.state("a", (s) => {
            s.event("go", "b", stage === "action" ? { action: boom } : {});
            s.onExit(stage === "exit" ? boom : recorder.hook("exit a"));
          });
          w.state("b", (s) => {
            s.onEntry(stage === "entry" ? boom : recorder.hook("entry b"));
          });
          w.onTransition(stage === "transition" ? boom : recorder.hook("transition"));
        },
        { registry }
      );
    }

    it("propagates an action error with the state unchanged", () => {
      const workflow = createWorkflow(defineFailing("action"));

      expect(() => workflow.fire("go")).toThrow("action failed");
      expect(workflow.currentState).toBe("a");
      expect(workflow.halted).toBe(false);
      expect(recorder.log).toEqual([]);
      expect(logger.getLastCallAt("ERROR")?.data?.["stage"]).toBe("action");
    });

    it("stops before on_exit when an on_transition hook throws", () => {
      const workflow = createWorkflow(defineFailing("transition"));

      expect(() => workflow.fire("go")).toThrow("transition failed");
      expect(workflow.currentState).toBe("a");
      expect(recorder.log).toEqual([]);
      expect(logger.getLastCallAt("ERROR")?.data?.["stage"]).toBe("on_transition");
    });

    it("keeps the source state when on_exit throws", () => {
      const workflow = createWorkflow(defineFailing("exit"));

      expect(() => workflow.fire("go")).toThrow("exit failed");
      expect(workflow.currentState).toBe("a");
      expect(recorder.log).toEqual(["transition"]);
    });

    it("has already changed state when on_entry throws", () => {
      const workflow = createWorkflow(defineFailing("entry"));

      expect(() => workflow.fire("go")).toThrow("entry failed");
      expect(workflow.currentState).toBe("b");
      expect(recorder.log).toEqual(["transition", "exit a"]);
      expect(logger.getLastCallAt("ERROR")?.data?.["stage"]).toBe("on_entry");
    });
  });

  describe("logging", () => {
    it("logs a completed transition at INFO and summarises it at REPORT", () => {
      const workflow = createWorkflow(defineOrdering());
      logger.clear();

      workflow.fire("go");

      expect(logger.calls.filter((call) => call.level !== "TRACE")).toEqual([
        {
          level: "DEBUG",
          message: "Transition started",
          data: { workflow: "Ordering", event: "go", from: "first", to: "second" },
        },
        {
          level: "INFO",
          message: "Transition completed",
          data: { workflow: "Ordering", event: "go", from: "first", to: "second" },
        },
        {
          level: "REPORT",
          message: "Transition summary",
          data: {
            workflow: "Ordering",
            event: "go",
            from: "first",
            status: "transitioned",
            to: "second",
            routines: 5,
          },
        },
      ]);
    });

    it("marks the start and end of every stage that has routines at TRACE", () => {
      const workflow = createWorkflow(defineOrdering());
      logger.clear();

      workflow.fire("go");

      expect(
        logger.getCallsAtLevel("TRACE").map((call) => [call.message, call.data?.["timing"]])
      ).toEqual([
        ["Stage action", "start"],
        ["Stage action", "end"],
        ["Stage on_transition", "start"],
        ["Stage on_transition", "end"],
        ["Stage on_exit", "start"],
        ["Stage on_exit", "end"],
        ["Stage on_entry", "start"],
        ["Stage on_entry", "end"],
      ]);
      expect(logger.getCallsAtLevel("TRACE")[0]?.data).toEqual({
        workflow: "Ordering",
        event: "go",
        from: "first",
        stage: "action",
        timing: "start",
      });
    });

    it("skips stages without routines and closes the stage a routine threw in", () => {
      const spec = defineWorkflow(
        "Sparse",
        (w) => {
          w.state("a", (s) => {
            s.event("go", "b");
          });
          w.state("b", (s) => {
            s.onEntry(() => {
              throw new Error("entry failed");
            });
          });
        },
        { registry }
      );
      const workflow = createWorkflow(spec);
      logger.clear();

      expect(() => workflow.fire("go")).toThrow("entry failed");

      expect(
        logger.getCallsAtLevel("TRACE").map((call) => [call.message, call.data?.["timing"]])
      ).toEqual([
        ["Stage on_entry", "start"],
        ["Stage on_entry", "end"],
      ]);
      expect(logger.getCallsAtLevel("REPORT")).toEqual([]);
    });

    it("logs a halt at WARN", () => {
      const spec = defineReviewWorkflow(registry, ({ halt }) => halt("later"));
      const workflow = bindWorkflow(createArticle(), spec, { initialState: "being_reviewed" });

      workflow.fire("accept");

      expect(logger.getLastCallAt("WARN")).toEqual({
        level: "WARN",
        message: "Transition halted",
        data: { workflow: "Article", event: "accept", from: "being_reviewed", reason: "later" },
      });
      expect(logger.getLastCallAt("REPORT")?.data).toEqual({
        workflow: "Article",
        event: "accept",
        from: "being_reviewed",
        status: "halted",
        reason: "later",
        routines: 1,
      });
      expect(
        logger.getCallsAtLevel("TRACE").map((call) => [call.message, call.data?.["timing"]])
      ).toEqual([
        ["Stage action", "start"],
        ["Stage action", "end"],
      ]);
    });

    it("uses the instance logger over the specification logger", () => {
      const instanceLogger = createMockLogger();
      const workflow = createWorkflow(defineOrdering(), { logger: instanceLogger });
      logger.clear();

      workflow.fire("go");

      expect(logger.calls).toEqual([]);
      expect(instanceLogger.hasLoggedAt("INFO", "Transition completed")).toBe(true);
    });
  });
});
