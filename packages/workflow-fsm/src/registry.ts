/**
 * Process-wide registry of workflow specifications.
 *
 * A specification is created the first time its name is declared and
 * re-opened by every later declaration of the same name. Nothing is ever
 * removed outside of tests.
 *
 * Declaring (or re-opening) specifications must not be interleaved with
 * transitions on instances bound to them; do it at setup time.
 *
 * @example
 * ```typescript
 * const registry = SpecificationRegistry.getInstance();
 *
 * registry.has("Article");          // true once defineWorkflow("Article", ...) ran
 * registry.require("Article");      // Specification, or throws
 * registry.names();                 // ["Article", ...]
 * ```
 */
import {
  createConfiguredLogger,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
  type Logger,
} from "@waypoint/workflow-core";
import { Specification } from "./definitions.js";
import { SpecificationError, SpecificationNotFoundError } from "./errors.js";

export interface SpecificationRegistryOptions {
  /** Engine options; unset fields come from the environment, then defaults */
  config?: EngineConfigInput;
  /** Environment read for overrides (default: `process.env`) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Logger shared by every specification of this registry */
  logger?: Logger;
}

export class SpecificationRegistry {
  private static instance: SpecificationRegistry | null = null;
  private readonly specifications = new Map<string, Specification>();
  private readonly sharedLogger: Logger | undefined;
  readonly config: EngineConfig;

  constructor(options: SpecificationRegistryOptions = {}) {
    this.config = resolveEngineConfig(options.config, options.env);
    this.sharedLogger = options.logger;
  }

  /**
   * Get the process-wide registry.
   */
  static getInstance(): SpecificationRegistry {
    if (!SpecificationRegistry.instance) {
      SpecificationRegistry.instance = new SpecificationRegistry();
    }
    return SpecificationRegistry.instance;
  }

  /**
   * Drop the process-wide registry (for testing only).
   */
  static resetForTesting(): void {
    SpecificationRegistry.instance = null;
  }

  /**
   * Get the specification registered under `name`, creating an empty one on
   * first use.
   */
  declare(name: string): Specification {
    if (name.trim() === "") {
      throw new SpecificationError(
        "WORKFLOW_INVALID_DECLARATION",
        name,
        "Workflow names must not be empty"
      );
    }
    const existing = this.specifications.get(name);
    if (existing) return existing;

    const logger = this.sharedLogger ?? createConfiguredLogger(`Workflow:${name}`, this.config);
    const specification = new Specification(name, logger);
    this.specifications.set(name, specification);
    logger.debug("Specification created", { workflow: name });
    return specification;
  }

  get(name: string): Specification | undefined {
    return this.specifications.get(name);
  }

  /**
   * @throws SpecificationNotFoundError if nothing was declared under `name`
   */
  require(name: string): Specification {
    const specification = this.specifications.get(name);
    if (!specification) {
      throw new SpecificationNotFoundError(name);
    }
    return specification;
  }

  has(name: string): boolean {
    return this.specifications.has(name);
  }

  names(): string[] {
    return [...this.specifications.keys()];
  }

  size(): number {
    return this.specifications.size;
  }
}
