import type { InvocationContext } from './context.js';
import { Resource } from './base.js';
import type { Validator } from './validator.js';

/**
 * Function signature accepted by `FunctionResource`.
 */
export type ResourceFunction<TInput, TOutput> = (
  input: TInput,
  context: InvocationContext
) => Promise<TOutput> | TOutput;

export interface FunctionResourceOptions<TInput, TOutput> {
  input?: Validator<TInput>;
  output?: Validator<TOutput>;
}

/**
 * Adapts a plain function to the resource contract, so that functions can be
 * registered and invoked exactly like resource classes.
 *
 * @example
 * ```typescript
 * const getUser = new FunctionResource(async ({ id }: { id: number }) => users.get(id));
 * ```
 */
export class FunctionResource<TInput = unknown, TOutput = unknown> extends Resource<TInput, TOutput> {
  readonly fn: ResourceFunction<TInput, TOutput>;
  private readonly validators: FunctionResourceOptions<TInput, TOutput>;

  constructor(fn: ResourceFunction<TInput, TOutput>, options: FunctionResourceOptions<TInput, TOutput> = {}) {
    super();
    this.fn = fn;
    this.validators = options;
  }

  perform(input: TInput, context: InvocationContext): Promise<TOutput> | TOutput {
    return this.fn(input, context);
  }

  protected override inputValidator(): Validator<TInput> | null {
    return this.validators.input ?? null;
  }

  protected override outputValidator(): Validator<TOutput> | null {
    return this.validators.output ?? null;
  }

  override get name(): string {
    return this.fn.name || 'anonymous';
  }

  override toString(): string {
    return `FunctionResource(${this.name})`;
  }
}
