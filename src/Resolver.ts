/**
 * Resolution entry points.
 *
 * `planResolution` builds the dependency graph of a registered configuration
 * and orders its invocations; `resolve` also evaluates the plan and returns
 * the primary module inputs with their provenance.
 *
 * @since 0.1.0
 */

import { Effect, type Either } from "effect"
import { BindingStore } from "./BindingStore.js"
import { Catalog } from "./Catalog.js"
import type { ComputeRegistry } from "./Compute.js"
import type { ResolverConfig } from "./Config.js"
import type { ResolutionError, ScheduleError, UnknownConfigurationError } from "./Errors.js"
import { evaluatePlan, type ProvenanceTrace } from "./Evaluator.js"
import { buildDependencyGraph } from "./internal/graph/DependencyGraph.js"
import { scheduleInvocations, type ExecutionPlan } from "./internal/graph/Scheduler.js"
import type { VarValue } from "./VarValue.js"

/**
 * @since 0.1.0
 * @category Models
 */
export interface Resolution {
  readonly configuration: string
  readonly primaryInputs: Readonly<Record<string, VarValue>>
  readonly trace: ProvenanceTrace
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface ResolutionRequest {
  readonly configuration: string
  readonly rawValues?: Readonly<Record<string, VarValue>>
}

/**
 * Order the invocations of a configuration, assuming raw values will be
 * supplied for `supplied`.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const planResolution = (
  name: string,
  supplied: Iterable<string> = [],
): Effect.Effect<ExecutionPlan, UnknownConfigurationError | ScheduleError, BindingStore | Catalog> =>
  Effect.gen(function* () {
    const store = yield* BindingStore
    const catalog = yield* Catalog
    const configuration = yield* store.getConfiguration(name)
    const graph = buildDependencyGraph(
      configuration.bindings,
      catalog.primaryContract(configuration.primaryModules),
    )
    return yield* scheduleInvocations(graph, configuration.bindings.evaluatedInputs, {
      catalog,
      supplied: new Set(supplied),
    })
  }).pipe(Effect.annotateLogs({ configuration: name }))

/**
 * Resolve a configuration against raw UI values.
 *
 * @category Resolution
 * @since 0.1.0
 * @example
 * ```ts
 * const resolution = yield* resolve("Biopower-LCOE Calculator", {
 *   biomass_feed_rate_pct: numberValue(0.8),
 * })
 * resolution.primaryInputs.biomass_feed_rate
 * ```
 */
export const resolve = (
  name: string,
  rawValues: Readonly<Record<string, VarValue>> = {},
): Effect.Effect<Resolution, ResolutionError, BindingStore | Catalog | ComputeRegistry | ResolverConfig> =>
  Effect.gen(function* () {
    const supplied = Object.keys(rawValues).filter((key) => rawValues[key] !== undefined)
    const plan = yield* planResolution(name, supplied)
    const { primaryInputs, trace } = yield* evaluatePlan(plan, rawValues)
    yield* Effect.logDebug(`resolved ${Object.keys(primaryInputs).length} primary input(s)`)
    return { configuration: name, primaryInputs, trace }
  }).pipe(Effect.annotateLogs({ configuration: name }), Effect.withLogSpan("resolve"))

/**
 * Resolve several configurations, each independently.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const resolveMany = (
  requests: ReadonlyArray<ResolutionRequest>,
  options: { readonly concurrency?: number } = {},
): Effect.Effect<
  ReadonlyArray<Either.Either<Resolution, ResolutionError>>,
  never,
  BindingStore | Catalog | ComputeRegistry | ResolverConfig
> =>
  Effect.forEach(requests, (request) => Effect.either(resolve(request.configuration, request.rawValues)), {
    concurrency: options.concurrency ?? 1,
  })
