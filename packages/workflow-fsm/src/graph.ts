/**
 * Graphviz export of a workflow specification.
 *
 * @example
 * ```typescript
 * writeFileSync("article.dot", toDot(articleWorkflow));
 * // dot -Tsvg article.dot > article.svg
 * ```
 */
import type { Specification } from "./definitions.js";
import { describeSpecification } from "./reflection.js";

export interface DotOptions {
  /** Graph direction (default: "LR") */
  rankdir?: "LR" | "TB" | "RL" | "BT";
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/**
 * Render the specification as a DOT digraph. The initial state is drawn
 * bold, terminal states doubled, and undeclared targets dashed.
 */
export function toDot(specification: Specification, options: DotOptions = {}): string {
  const descriptor = describeSpecification(specification);
  const lines = [`digraph ${quote(descriptor.name)} {`, `  rankdir=${options.rankdir ?? "LR"};`];

  for (const state of descriptor.states) {
    const attributes = [`label=${quote(state.name)}`];
    if (state.initial) attributes.push("style=bold");
    if (state.terminal) attributes.push("shape=doublecircle");
    lines.push(`  ${quote(state.name)} [${attributes.join(", ")}];`);
  }

  const declared = new Set(descriptor.states.map((state) => state.name));
  for (const target of new Set(specification.transitions().map((edge) => edge.to))) {
    if (!declared.has(target)) {
      lines.push(`  ${quote(target)} [label=${quote(target)}, style=dashed];`);
    }
  }

  for (const state of descriptor.states) {
    for (const event of state.events) {
      lines.push(`  ${quote(state.name)} -> ${quote(event.transitionsTo)} [label=${quote(event.name)}];`);
    }
  }

  lines.push("}");
  return lines.join("\n");
}
