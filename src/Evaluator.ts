/**
 * Plan evaluation.
 *
 * Walks an execution plan: seeds defaults and raw UI values, runs every
 * invocation in order, and collects the primary module inputs together with
 * a provenance trace recording who last wrote each variable.
 *
 * @since 0.1.0
 */

import { Effect, Option } from "effect"
import { ComputeRegistry } from "./Compute.js"
import { ResolverConfig } from "./Config.js"
import {
  MissingPrimaryInputError,
  UnknownCallableError,
  UnsatisfiedInputError,
  type EvaluationError,
} from "./Errors.js"
import { bindingTargets, sinkFeeds, type InvocationNode } from "./internal/graph/DependencyGraph.js"
import type { ExecutionPlan } from "./internal/graph/Scheduler.js"
import type { InvocationId, InvocationKind } from "./Types.js"
import type { VarValue } from "./VarValue.js"

/**
 * Origin of a variable's value.
 *
 * @since 0.1.0
 * @category Models
 */
export type Writer =
  | { readonly _tag: "Default" }
  | { readonly _tag: "RawInput" }
  | { readonly _tag: "Invocation"; readonly invocation: InvocationId }

/**
 * Last write of one variable. `position` is 0 for seeded values and the
 * 1-based step of the invocation otherwise. `boundFrom` names the variable
 * the value was copied from when it arrived through a binding.
 *
 * @since 0.1.0
 * @category Models
 */
export interface ProvenanceEntry {
  readonly variable: string
  readonly value: VarValue
  readonly writer: Writer
  readonly position: number
  readonly boundFrom?: string
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface SinkSource {
  readonly input: string
  readonly variable: string
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface ProvenanceTrace {
  readonly configuration: string
  /** Invocations in the order they ran. */
  readonly steps: ReadonlyArray<InvocationId>
  /** Sorted by variable name. */
  readonly entries: ReadonlyArray<ProvenanceEntry>
  /** Variable that supplied each primary input, in sink order. */
  readonly sinks: ReadonlyArray<SinkSource>
}

/**
 * @since 0.1.0
 * @category Models
 */
export interface Evaluation {
  readonly primaryInputs: Readonly<Record<string, VarValue>>
  readonly trace: ProvenanceTrace
}

const DEFAULT: Writer = { _tag: "Default" }
const RAW_INPUT: Writer = { _tag: "RawInput" }
const NONE_HELD: ReadonlySet<string> = new Set()

const invocationKind = (node: InvocationNode): InvocationKind =>
  node._tag === "EquationInvocation" ? "equation" : "module"

const hasOwn = (record: Readonly<Record<string, unknown>>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key)

/**
 * Run a plan against raw UI values.
 *
 * @category Evaluation
 * @since 0.1.0
 */
export const evaluatePlan = (
  plan: ExecutionPlan,
  rawValues: Readonly<Record<string, VarValue>>,
): Effect.Effect<Evaluation, EvaluationError, ComputeRegistry | ResolverConfig> =>
  Effect.gen(function* () {
    const registry = yield* ComputeRegistry
    const options = yield* ResolverConfig
    const { configuration, graph } = plan
    const state = new Map<string, ProvenanceEntry>()

    const write = (
      variable: string,
      value: VarValue,
      writer: Writer,
      position: number,
      boundFrom?: string,
      held: ReadonlySet<string> = NONE_HELD,
    ) => {
      if (plan.evaluated.has(variable) && writer._tag !== "Invocation") {
        return
      }
      state.set(
        variable,
        boundFrom === undefined
          ? { variable, value, writer, position }
          : { variable, value, writer, position, boundFrom },
      )
      for (const target of bindingTargets(graph, variable)) {
        if (!held.has(target)) {
          write(target, value, writer, position, variable, held)
        }
      }
    }

    // Defaults never replace a value that arrived through a binding.
    for (const node of graph.variables) {
      const value = plan.defaults.get(node.name)
      if (value !== undefined && !state.has(node.name)) {
        write(node.name, value, DEFAULT, 0)
      }
    }

    const supplied = new Map<string, VarValue>()
    for (const node of graph.variables) {
      const value = hasOwn(rawValues, node.name) ? rawValues[node.name] : undefined
      if (value === undefined) {
        continue
      }
      if (plan.evaluated.has(node.name)) {
        yield* Effect.logWarning(`raw value for evaluated input "${node.name}" ignored`)
        continue
      }
      supplied.set(node.name, value)
    }
    // A variable with its own raw value keeps it; bindings only fill the rest.
    const withOwnValue = new Set(supplied.keys())
    for (const [name, value] of supplied) {
      write(name, value, RAW_INPUT, 0, undefined, withOwnValue)
    }

    const known = new Set(graph.variables.map((node) => node.name))
    const extra = Object.keys(rawValues).filter((name) => !known.has(name))
    if (extra.length > 0) {
      yield* Effect.logDebug(`raw values outside the graph ignored: ${extra.sort().join(", ")}`)
    }

    for (const [index, node] of plan.order.entries()) {
      const position = index + 1
      const inputs: Record<string, VarValue> = {}
      for (const input of node.info.inputs) {
        const entry = state.get(input)
        if (entry === undefined) {
          return yield* new UnsatisfiedInputError({ configuration, variable: input, consumer: node.id })
        }
        inputs[input] = entry.value
      }

      const fn = registry.lookup(invocationKind(node), node.info.name)
      if (Option.isNone(fn)) {
        return yield* new UnknownCallableError({ configuration, invocation: node.id })
      }

      const outputs = yield* registry.invoke(configuration, node.id, fn.value, inputs)
      const declared = new Set(node.info.outputs)
      const undeclared: Array<string> = []
      for (const name of Object.keys(outputs)) {
        const value = outputs[name]
        if (!declared.has(name)) {
          undeclared.push(name)
        } else if (value !== undefined) {
          write(name, value, { _tag: "Invocation", invocation: node.id }, position)
        }
      }
      const missing = node.info.outputs.filter((name) => !hasOwn(outputs, name) || outputs[name] === undefined)

      if (undeclared.length > 0 && options.undeclaredOutputs === "warn") {
        yield* Effect.logWarning(`undeclared outputs ignored: ${undeclared.join(", ")}`).pipe(
          Effect.annotateLogs({ invocation: node.id }),
        )
      }
      if (missing.length > 0 && options.missingOutputs === "warn") {
        yield* Effect.logWarning(`declared outputs not returned: ${missing.join(", ")}`).pipe(
          Effect.annotateLogs({ invocation: node.id }),
        )
      }
      yield* Effect.logDebug(`step ${position} done`).pipe(Effect.annotateLogs({ invocation: node.id }))
    }

    const primaryInputs: Record<string, VarValue> = {}
    const sinks: Array<SinkSource> = []
    for (const sink of graph.sinks) {
      let chosen: ProvenanceEntry | undefined
      for (const feed of sinkFeeds(graph, sink)) {
        const entry = state.get(feed)
        // Last writer wins; on equal positions the later-declared feed does.
        if (entry !== undefined && (chosen === undefined || entry.position >= chosen.position)) {
          chosen = entry
        }
      }
      if (chosen === undefined) {
        return yield* Effect.die(new MissingPrimaryInputError({ configuration, variable: sink.name }))
      }
      primaryInputs[sink.name] = chosen.value
      sinks.push({ input: sink.name, variable: chosen.variable })
    }

    const entries = Array.from(state.values()).sort((a, b) =>
      a.variable < b.variable ? -1 : a.variable > b.variable ? 1 : 0,
    )

    return {
      primaryInputs,
      trace: {
        configuration,
        steps: plan.order.map((node) => node.id),
        entries,
        sinks,
      },
    }
  })
