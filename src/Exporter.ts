/**
 * Text export of binding sets and provenance traces.
 *
 * Output is deterministic: relations are sorted by kind, source and target,
 * configurations by name; declared lists keep their order.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { BindingStore } from "./BindingStore.js"
import type { UnknownConfigurationError } from "./Errors.js"
import type { ProvenanceEntry, ProvenanceTrace, Writer } from "./Evaluator.js"
import type { BindingSet, Configuration, EquationInfo, Relation, SecondaryModuleInfo } from "./Model.js"
import { RELATION_KINDS } from "./Types.js"
import { renderVarValue } from "./VarValue.js"

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

const quote = (name: string): string => `'${name}'`

const tuple = (names: ReadonlyArray<string>): string => `(${names.map(quote).join(", ")})`

const byEndpoints = (a: Relation, b: Relation): number =>
  compare(a.source, b.source) || compare(a.target, b.target)

const invocationLines = (invocations: ReadonlyArray<EquationInfo | SecondaryModuleInfo>): ReadonlyArray<string> =>
  invocations.map((info) => `    ${info.name}: ${tuple(info.inputs)} -> ${tuple(info.outputs)}`)

/**
 * @category Rendering
 * @since 0.1.0
 * @example
 * ```text
 * 'Biopower-LCOE Calculator':
 *   primary_inputs: ('biomass_feed_rate_pct')
 *   secondary_inputs: ()
 *   evaluated_inputs: ()
 *   equations:
 *     feed_rate: ('biomass_feed_rate_pct') -> ('biomass_feed_rate')
 *   secondary_modules:
 *   eqn_outputs_to_primary:
 *     'biomass_feed_rate' -> 'biomass_feed_rate'
 *   secondary_outputs_to_ui:
 *   ssc_to_eval:
 *   ui_to_secondary:
 * ```
 */
export const renderBindingSet = (bindings: BindingSet): string => {
  const lines = [
    `${quote(bindings.configuration)}:`,
    `  primary_inputs: ${tuple(bindings.primaryInputs)}`,
    `  secondary_inputs: ${tuple(bindings.secondaryInputs)}`,
    `  evaluated_inputs: ${tuple(bindings.evaluatedInputs)}`,
    "  equations:",
    ...invocationLines(bindings.equations),
    "  secondary_modules:",
    ...invocationLines(bindings.secondaryModules),
  ]
  for (const kind of RELATION_KINDS) {
    lines.push(`  ${kind}:`)
    for (const relation of [...bindings.relationsOf(kind)].sort(byEndpoints)) {
      lines.push(`    ${quote(relation.source)} -> ${quote(relation.target)}`)
    }
  }
  return `${lines.join("\n")}\n`
}

/**
 * Every configuration's binding set, sorted by configuration name and
 * separated by a blank line.
 *
 * @category Rendering
 * @since 0.1.0
 */
export const renderConfigurations = (configurations: ReadonlyArray<Configuration>): string =>
  [...configurations]
    .sort((a, b) => compare(a.name, b.name))
    .map((configuration) => renderBindingSet(configuration.bindings))
    .join("\n")

const renderWriter = (writer: Writer): string => {
  switch (writer._tag) {
    case "Default":
      return "default"
    case "RawInput":
      return "raw input"
    case "Invocation":
      return writer.invocation
  }
}

const renderEntry = (entry: ProvenanceEntry): string => {
  const via = entry.boundFrom === undefined ? "" : ` via ${entry.boundFrom}`
  return `    ${entry.variable} = ${renderVarValue(entry.value)} <- ${renderWriter(entry.writer)} @${entry.position}${via}`
}

/**
 * @category Rendering
 * @since 0.1.0
 */
export const renderProvenance = (trace: ProvenanceTrace): string => {
  const lines = [
    `${quote(trace.configuration)} provenance:`,
    "  order:",
    ...trace.steps.map((step, index) => `    ${index + 1}. ${step}`),
    "  variables:",
    ...trace.entries.map(renderEntry),
    "  primary_inputs:",
    ...trace.sinks.map((sink) => `    ${sink.input} <- ${sink.variable}`),
  ]
  return `${lines.join("\n")}\n`
}

/**
 * Render the binding set of a registered configuration.
 *
 * @category Export
 * @since 0.1.0
 */
export const exportBindings = (name: string): Effect.Effect<string, UnknownConfigurationError, BindingStore> =>
  Effect.gen(function* () {
    const store = yield* BindingStore
    const bindings = yield* store.getBindingSet(name)
    return renderBindingSet(bindings)
  })

/**
 * @category Export
 * @since 0.1.0
 */
export const exportAllBindings: Effect.Effect<string, never, BindingStore> = Effect.gen(function* () {
  const store = yield* BindingStore
  const configurations = yield* store.configurations
  return renderConfigurations(configurations)
})

/**
 * @category Export
 * @since 0.1.0
 */
export const exportProvenance = (trace: ProvenanceTrace): string => renderProvenance(trace)
