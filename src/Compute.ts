/**
 * Compute registry.
 *
 * Equations and secondary modules are opaque callables registered by name.
 * The evaluator looks them up per invocation and runs them here. A throw, or
 * a result that is not a record of `VarValue`s, becomes an
 * `InvocationFailedError`.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option, Schema } from "effect"
import { InvocationFailedError } from "./Errors.js"
import type { InvocationId, InvocationKind } from "./Types.js"
import { VarValue } from "./VarValue.js"

/**
 * A callable maps named input values to named output values.
 *
 * @since 0.1.0
 * @category Models
 */
export type ComputeFn = (inputs: Readonly<Record<string, VarValue>>) => Readonly<Record<string, VarValue>>

/**
 * @since 0.1.0
 * @category Models
 */
export interface ComputeFunctions {
  readonly equations?: Readonly<Record<string, ComputeFn>>
  readonly modules?: Readonly<Record<string, ComputeFn>>
}

/**
 * @since 0.1.0
 * @category Services
 */
export interface ComputeRegistryService {
  readonly lookup: (kind: InvocationKind, name: string) => Option.Option<ComputeFn>
  readonly invoke: (
    configuration: string,
    invocation: InvocationId,
    fn: ComputeFn,
    inputs: Readonly<Record<string, VarValue>>,
  ) => Effect.Effect<Readonly<Record<string, VarValue>>, InvocationFailedError>
}

const own = (table: Readonly<Record<string, ComputeFn>> | undefined, name: string): Option.Option<ComputeFn> =>
  table !== undefined && Object.prototype.hasOwnProperty.call(table, name)
    ? Option.fromNullable(table[name])
    : Option.none()

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error))

const decodeOutputs = Schema.decodeUnknown(Schema.Record({ key: Schema.String, value: VarValue }))

/**
 * @since 0.1.0
 * @category Constructors
 */
export const makeComputeRegistry = (functions: ComputeFunctions = {}): ComputeRegistryService => ({
  lookup: (kind, name) => own(kind === "equation" ? functions.equations : functions.modules, name),
  invoke: (configuration, invocation, fn, inputs) =>
    Effect.try({
      try: () => fn(inputs),
      catch: (error) => new InvocationFailedError({ configuration, invocation, problem: describe(error) }),
    }).pipe(
      Effect.flatMap((outputs) =>
        decodeOutputs(outputs).pipe(
          Effect.mapError(
            () =>
              new InvocationFailedError({
                configuration,
                invocation,
                problem: "returned outputs that are not named variable values",
              }),
          ),
        ),
      ),
    ),
})

/**
 * Callables for equations and secondary modules.
 *
 * @category Services
 * @since 0.1.0
 */
export class ComputeRegistry extends Context.Tag("config-binding-resolver/ComputeRegistry")<
  ComputeRegistry,
  ComputeRegistryService
>() {
  static layer(functions: ComputeFunctions = {}) {
    return Layer.succeed(this, makeComputeRegistry(functions))
  }
}
