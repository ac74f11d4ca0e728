import type { SagaStep } from './types.js';

/**
 * Immutable snapshot produced by {@link SagaBuilder.build}.
 * The single source of truth for stage order, read by both execution and
 * compensation.
 */
export interface SagaDefinition {
  /** Ordered, immutable array of saga steps. */
  readonly steps: ReadonlyArray<SagaStep>;
}

/**
 * Fluent builder for constructing a {@link SagaDefinition}.
 *
 * Steps are executed in the order they are added.
 * Once {@link build} is called the underlying array is frozen so the
 * definition cannot be mutated afterwards.
 *
 * @example
 * ```typescript
 * const pipeline = new SagaBuilder()
 *   .addStep(validateOrderStep)
 *   .addStep(reserveInventoryStep)
 *   .build();
 * ```
 */
export class SagaBuilder {
  private readonly _steps: SagaStep[] = [];

  /**
   * Append a step to the saga.
   * Returns `this` to allow fluent chaining.
   *
   * @throws {Error} If a step with the same `name` has already been added.
   */
  addStep(step: SagaStep): this {
    if (this._steps.some((s) => s.name === step.name)) {
      throw new Error(
        `SagaBuilder: a step named "${step.name}" has already been added. Step names must be unique.`,
      );
    }
    this._steps.push(step);
    return this;
  }

  /**
   * Finalise the builder and return an immutable {@link SagaDefinition}.
   *
   * @throws {Error} If no steps have been added.
   */
  build(): SagaDefinition {
    if (this._steps.length === 0) {
      throw new Error('SagaBuilder: cannot build a saga with no steps.');
    }
    return { steps: Object.freeze([...this._steps]) };
  }
}
