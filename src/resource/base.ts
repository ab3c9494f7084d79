import { ValidationError } from '../errors.js';
import type { CacheOptions } from '../cache/cache-policy.js';
import type { InvocationContext } from './context.js';
import type { Validator } from './validator.js';

/**
 * Interface for resource class metadata.
 *
 * All static properties are optional: declarations infer the name from the
 * class identifier and the namespace from the declaring module.
 */
export interface ResourceClass<R extends Resource = Resource> {
  /** Registered name (inferred from the class name when absent) */
  resourceName?: string;

  /** Dotted namespace (inferred from the declaring module when absent) */
  resourceNamespace?: string;

  /** Override tier (default tier when absent) */
  tier?: string;

  /** Set to false to keep a class out of declaration lists */
  autoRegister?: boolean;

  /** Class-level cache configuration */
  cache?: CacheOptions;

  readonly name: string;

  new (): R;
}

/**
 * Abstract base class for resources.
 *
 * A resource is a unit of business behavior with a validated input and
 * output. Subclasses implement `perform`; callers go through `execute`, which
 * validates the input, performs the work and validates the output.
 *
 * A single instance is shared by every caller of its dotted path, so
 * `perform` must keep per-call state in locals or in the context.
 *
 * @example
 * ```typescript
 * class GetInvoiceResource extends Resource<{ id: number }, Invoice> {
 *   static resourceNamespace = 'billing';
 *
 *   protected override inputValidator() {
 *     return fromZod(z.object({ id: z.number().int() }));
 *   }
 *
 *   async perform(input: { id: number }): Promise<Invoice> {
 *     return invoices.find(input.id);
 *   }
 * }
 * ```
 */
export abstract class Resource<TInput = unknown, TOutput = unknown> {
  static resourceName?: string;
  static resourceNamespace?: string;
  static tier?: string;
  static autoRegister = true;
  static cache?: CacheOptions;

  /**
   * Business logic: turn validated input into output.
   */
  abstract perform(input: TInput, context: InvocationContext): Promise<TOutput> | TOutput;

  /**
   * Validator applied to every input. Override to enable input validation.
   */
  protected inputValidator(): Validator<TInput> | null {
    return null;
  }

  /**
   * Validator applied to every output. Override to enable output validation.
   */
  protected outputValidator(): Validator<TOutput> | null {
    return null;
  }

  /**
   * Validate the input, throwing `ValidationError` with the offending fields.
   */
  validateInput(input: TInput): TInput {
    const validator = this.inputValidator();
    return validator ? this.check(validator, input, 'input') : input;
  }

  /**
   * Validate the output, throwing `ValidationError` with the offending fields.
   */
  validateOutput(output: TOutput): TOutput {
    const validator = this.outputValidator();
    return validator ? this.check(validator, output, 'output') : output;
  }

  /**
   * Run the full pipeline: validate input, perform, validate output.
   */
  async execute(input: TInput, context: InvocationContext): Promise<TOutput> {
    const validated = this.validateInput(input);
    const output = await this.perform(validated, context);
    return this.validateOutput(output);
  }

  /**
   * Get the class name of this resource.
   */
  get name(): string {
    return this.constructor.name;
  }

  /**
   * Get a string representation of the resource.
   */
  toString(): string {
    return `${this.constructor.name}()`;
  }

  private check<T>(validator: Validator<T>, value: unknown, stage: 'input' | 'output'): T {
    const outcome = validator(value);
    if (!outcome.success) {
      throw new ValidationError(stage, outcome.issues);
    }
    return outcome.data;
  }
}

/**
 * Resource with erased input and output types, as stored by the registry.
 */
export type AnyResource = Resource<unknown, unknown>;

/**
 * Factory producing the instance of a binding.
 */
export type ResourceFactory<R extends AnyResource = AnyResource> = () => R | Promise<R>;

/**
 * Check if a value is a resource class.
 */
export function isResourceClass(value: unknown): value is ResourceClass {
  return typeof value === 'function' && value.prototype instanceof Resource;
}
