/**
 * ## Meta Dictionary - Application Data on Graph Nodes
 *
 * Ordered key → value data attached to a state or an event at declaration
 * time. The engine never reads it; it exists for tooling (admin panels,
 * diagrams, permission tables).
 *
 * A dictionary is immutable. Re-opening a specification and adding meta to an
 * existing node produces a new dictionary via `merge`.
 *
 * @example
 * ```typescript
 * const meta = MetaDictionary.from({ color: "yellow", owner: "editors" });
 *
 * meta.get("color");    // "yellow"
 * meta.attrs.owner;     // "editors"
 * [...meta.keys()];     // ["color", "owner"]
 * ```
 */
import type { UnknownRecord } from "@waypoint/workflow-core";

/**
 * Input accepted wherever meta can be declared.
 */
export type MetaInput = UnknownRecord | MetaDictionary;

export class MetaDictionary implements Iterable<[string, unknown]> {
  static readonly EMPTY = new MetaDictionary([]);

  private readonly values: ReadonlyMap<string, unknown>;

  /**
   * Attribute-style view over keyed lookup: `meta.attrs.color` is
   * `meta.get("color")`. Has no prototype, so only declared keys resolve.
   */
  readonly attrs: Readonly<UnknownRecord>;

  constructor(entries: Iterable<readonly [string, unknown]>) {
    this.values = new Map(entries);
    const attrs: UnknownRecord = Object.create(null);
    for (const [key, value] of this.values) {
      attrs[key] = value;
    }
    this.attrs = Object.freeze(attrs);
    Object.freeze(this);
  }

  static from(input: MetaInput | undefined): MetaDictionary {
    if (input === undefined) return MetaDictionary.EMPTY;
    if (input instanceof MetaDictionary) return input;
    const entries = Object.entries(input);
    return entries.length === 0 ? MetaDictionary.EMPTY : new MetaDictionary(entries);
  }

  get size(): number {
    return this.values.size;
  }

  get isEmpty(): boolean {
    return this.values.size === 0;
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): IterableIterator<string> {
    return this.values.keys();
  }

  entries(): IterableIterator<[string, unknown]> {
    return this.values.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this.values.entries();
  }

  /**
   * Return a dictionary holding this one's pairs followed by `input`'s.
   * Keys present in both keep their original position and take the new value.
   */
  merge(input: MetaInput | undefined): MetaDictionary {
    const other = MetaDictionary.from(input);
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    const merged = new Map(this.values);
    for (const [key, value] of other) {
      merged.set(key, value);
    }
    return new MetaDictionary(merged);
  }

  toObject(): UnknownRecord {
    return Object.fromEntries(this.values);
  }
}
