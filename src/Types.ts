/**
 * Type Foundations
 *
 * Names and literal vocabularies shared by the catalog, the binding store and
 * the resolver. Variables, configurations, forms and modules are all
 * identified by name; the schemas below reject empty or padded names at
 * decode time.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Name of a UI or simulation variable.
 *
 * @since 0.1.0
 * @category Names
 */
export const VariableName = Schema.NonEmptyTrimmedString

/**
 * Name of a technology/financial configuration, e.g. `"Biopower-LCOE Calculator"`.
 *
 * @since 0.1.0
 * @category Names
 */
export const ConfigurationName = Schema.NonEmptyTrimmedString

/**
 * Relation kinds of a binding set.
 *
 * - `ssc_to_eval`: primary-module variables satisfied by evaluated inputs
 * - `eqn_outputs_to_primary`: equation output → primary-module input
 * - `ui_to_secondary`: UI variable → secondary-module input
 * - `secondary_outputs_to_ui`: secondary-module output → UI variable
 *
 * @since 0.1.0
 * @category Vocabulary
 */
export const RelationKind = Schema.Literal(
  "ssc_to_eval",
  "eqn_outputs_to_primary",
  "ui_to_secondary",
  "secondary_outputs_to_ui",
)

/**
 * @since 0.1.0
 * @category Vocabulary
 */
export type RelationKind = typeof RelationKind.Type

/**
 * Every relation kind, sorted by name.
 *
 * @since 0.1.0
 * @category Vocabulary
 */
export const RELATION_KINDS: ReadonlyArray<RelationKind> = [...RelationKind.literals].sort()

/**
 * Relation kinds whose target is another variable (the target takes the
 * source's value). The other kinds target a primary-module input.
 *
 * @since 0.1.0
 * @category Vocabulary
 */
export const isVariableBinding = (kind: RelationKind): boolean =>
  kind === "ui_to_secondary" || kind === "secondary_outputs_to_ui"

/**
 * Role a declared input plays in a configuration.
 *
 * @since 0.1.0
 * @category Vocabulary
 */
export const InputRole = Schema.Literal("primary", "secondary", "evaluated")

/**
 * @since 0.1.0
 * @category Vocabulary
 */
export type InputRole = typeof InputRole.Type

/**
 * Role of a compute module within the simulation.
 *
 * @since 0.1.0
 * @category Vocabulary
 */
export const ModuleRole = Schema.Literal("primary", "secondary")

/**
 * @since 0.1.0
 * @category Vocabulary
 */
export type ModuleRole = typeof ModuleRole.Type

/**
 * Kind of an invocation node in the dependency graph.
 *
 * @since 0.1.0
 * @category Vocabulary
 */
export type InvocationKind = "equation" | "module"

/**
 * Stable identity of an invocation, `equation:<name>` or `module:<name>`.
 *
 * @since 0.1.0
 * @category Names
 */
export type InvocationId = `${InvocationKind}:${string}`

/**
 * @since 0.1.0
 * @category Names
 */
export const invocationId = (kind: InvocationKind, name: string): InvocationId => `${kind}:${name}`
