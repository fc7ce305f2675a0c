/**
 * ## Persistence Boundary
 *
 * The engine never stores state. A `WorkflowPersistence` tells
 * `attachWorkflow` where a host's current state lives: it is read once when
 * the workflow is attached and written after every completed transition.
 * Halted and failed transitions write nothing.
 *
 * @example
 * ```typescript
 * // State kept on the host object itself
 * const persistence = fieldPersistence("workflowState");
 *
 * // State kept beside the host, keyed by id
 * const persistence = new InMemoryPersistence<Article>((article) => article.id);
 * ```
 */

export interface WorkflowPersistence<THost> {
  /**
   * Stored state of `host`, or undefined for a host never saved.
   */
  loadState(host: THost): string | undefined;

  saveState(host: THost, state: string): void;
}

/**
 * Keeps states in memory, keyed by host identity or by `keyOf(host)`.
 */
export class InMemoryPersistence<THost extends object> implements WorkflowPersistence<THost> {
  private readonly byIdentity = new WeakMap<THost, string>();
  private readonly byKey = new Map<string, string>();

  constructor(private readonly keyOf?: (host: THost) => string) {}

  loadState(host: THost): string | undefined {
    return this.keyOf ? this.byKey.get(this.keyOf(host)) : this.byIdentity.get(host);
  }

  saveState(host: THost, state: string): void {
    if (this.keyOf) {
      this.byKey.set(this.keyOf(host), state);
    } else {
      this.byIdentity.set(host, state);
    }
  }
}

/**
 * Keep the state in a string field of the host object.
 */
export function fieldPersistence<K extends string>(
  field: K
): WorkflowPersistence<Record<K, string | undefined>> {
  return {
    loadState(host: Record<K, string | undefined>): string | undefined {
      return host[field];
    },
    saveState(host: Record<K, string | undefined>, state: string): void {
      host[field] = state;
    },
  };
}
