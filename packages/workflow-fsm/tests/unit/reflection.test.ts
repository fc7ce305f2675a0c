/**
 * Unit tests for specification reflection and DOT export.
 */
import { describe, it, expect, beforeEach } from "vitest";
import {
  defineWorkflow,
  describeSpecification,
  findUnresolvedTargets,
  toDot,
  UnknownStateError,
  type Specification,
  type SpecificationRegistry,
} from "../../src/index.js";
import { createTestRegistry } from "../fixtures/review.js";

describe("reflection", () => {
  let registry: SpecificationRegistry;
  let spec: Specification;

  beforeEach(() => {
    registry = createTestRegistry();
    spec = defineWorkflow(
      "Docs",
      (w) => {
        w.state("draft", { color: "grey" }, (s) => {
          s.event("publish", "live", { meta: { label: "Go live" }, action: () => {} });
          s.onExit(() => {});
        });
        w.state("live", (s) => {
          s.event("archive", "archived");
          s.onEntry(() => {});
        });
        w.onTransition(() => {});
      },
      { registry }
    );
  });

  function declareArchived(): void {
    defineWorkflow("Docs", (w) => w.state("archived"), { registry });
  }

  it("describes states, events, hooks and meta in declaration order", () => {
    expect(describeSpecification(spec)).toEqual({
      name: "Docs",
      initialState: "draft",
      transitionHookCount: 1,
      states: [
        {
          name: "draft",
          initial: true,
          terminal: false,
          hasEntryHook: false,
          hasExitHook: true,
          events: [{ name: "publish", transitionsTo: "live", hasAction: true, meta: { label: "Go live" } }],
          meta: { color: "grey" },
        },
        {
          name: "live",
          initial: false,
          terminal: false,
          hasEntryHook: true,
          hasExitHook: false,
          events: [{ name: "archive", transitionsTo: "archived", hasAction: false, meta: {} }],
          meta: {},
        },
      ],
    });
  });

  it("freezes descriptors", () => {
    const descriptor = describeSpecification(spec);

    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.states)).toBe(true);
    expect(Object.isFrozen(descriptor.states[0])).toBe(true);
  });

  it("lists transitions as edges", () => {
    expect(spec.transitions()).toEqual([
      { from: "draft", event: "publish", to: "live" },
      { from: "live", event: "archive", to: "archived" },
    ]);
  });

  it("finds targets that are not declared", () => {
    expect(findUnresolvedTargets(spec)).toEqual([
      { state: "live", event: "archive", target: "archived" },
    ]);

    declareArchived();

    expect(findUnresolvedTargets(spec)).toEqual([]);
  });

  it("reports terminal states", () => {
    expect(spec.terminalStates()).toEqual([]);

    declareArchived();

    expect(spec.terminalStates()).toEqual(["archived"]);
    expect(spec.isTerminal("archived")).toBe(true);
    expect(spec.isTerminal("draft")).toBe(false);
  });

  it("compares states by declaration order", () => {
    expect(spec.compareStates("draft", "live")).toBe(-1);
    expect(spec.compareStates("live", "draft")).toBe(1);
    expect(spec.compareStates("live", "live")).toBe(0);
    expect(() => spec.compareStates("draft", "gone")).toThrow(UnknownStateError);
  });

  describe("toDot", () => {
    it("renders states and edges, dashing undeclared targets", () => {
      expect(toDot(spec)).toBe(
        [
          'digraph "Docs" {',
          "  rankdir=LR;",
          '  "draft" [label="draft", style=bold];',
          '  "live" [label="live"];',
          '  "archived" [label="archived", style=dashed];',
          '  "draft" -> "live" [label="publish"];',
          '  "live" -> "archived" [label="archive"];',
          "}",
        ].join("\n")
      );
    });

    it("marks terminal states and honours rankdir", () => {
      declareArchived();

      const lines = toDot(spec, { rankdir: "TB" }).split("\n");

      expect(lines[1]).toBe("  rankdir=TB;");
      expect(lines).toContain('  "archived" [label="archived", shape=doublecircle];');
      expect(lines).not.toContain('  "archived" [label="archived", style=dashed];');
    });

    it("escapes quotes in names", () => {
      const quoted = defineWorkflow('Say "hi"', (w) => w.state("only"), { registry });

      expect(toDot(quoted).split("\n")[0]).toBe('digraph "Say \\"hi\\"" {');
    });
  });
});
