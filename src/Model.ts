/**
 * Core Domain Schemas for configuration bindings
 *
 * This module defines the declarative data a configuration is built from:
 * - PageInfo: one sidebar page of UI forms
 * - EquationInfo: an equation's UI inputs and outputs
 * - SecondaryModuleInfo: one secondary compute module call
 * - Relation: a (source, target) pair of a given relation kind
 * - BindingSet: every relation and declared input of a configuration
 * - Configuration: pages, modules and bindings under one name
 *
 * @since 0.1.0
 */

import { Schema } from "effect"
import { ConfigurationName, InputRole, RelationKind, VariableName } from "./Types.js"

/**
 * PageInfo: a sidebar page of the configuration UI.
 *
 * Common forms are always shown. When `exclusiveVariable` is set, its value
 * selects which one of `exclusiveForms` is shown.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const page = new PageInfo({
 *   sidebarTitle: "Location and Resource",
 *   commonForms: ["Solar Resource Data"],
 *   exclusiveForms: [],
 * })
 * ```
 */
export class PageInfo extends Schema.Class<PageInfo>("PageInfo")({
  sidebarTitle: Schema.String,
  commonForms: Schema.Array(Schema.NonEmptyTrimmedString),
  exclusiveVariable: Schema.optional(VariableName),
  exclusiveForms: Schema.Array(Schema.NonEmptyTrimmedString),
}) {}

/**
 * EquationInfo: a UI-side transformation of variables.
 *
 * `name` is the key under which the equation's callable is registered. Input
 * and output order is kept for display; resolution ignores it.
 *
 * @since 0.1.0
 * @category Models
 */
export class EquationInfo extends Schema.Class<EquationInfo>("EquationInfo")({
  name: Schema.NonEmptyTrimmedString,
  inputs: Schema.Array(VariableName),
  outputs: Schema.Array(VariableName),
  uiForm: Schema.optional(Schema.String),
}) {}

/**
 * SecondaryModuleInfo: one call of a secondary compute module, run before
 * the primary simulation to produce some of its inputs.
 *
 * @since 0.1.0
 * @category Models
 */
export class SecondaryModuleInfo extends Schema.Class<SecondaryModuleInfo>("SecondaryModuleInfo")({
  name: Schema.NonEmptyTrimmedString,
  inputs: Schema.Array(VariableName),
  outputs: Schema.Array(VariableName),
  uiForm: Schema.optional(Schema.String),
}) {}

/**
 * Relation: a directed (source, target) pair of one relation kind.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const relation = new Relation({
 *   kind: "secondary_outputs_to_ui",
 *   source: "rotorD",
 *   target: "wind_turbine_rotor_diameter",
 * })
 * ```
 */
export class Relation extends Schema.Class<Relation>("Relation")({
  kind: RelationKind,
  source: VariableName,
  target: VariableName,
}) {
  /**
   * True when both relations describe the same pair.
   */
  sameAs(other: Relation): boolean {
    return this.kind === other.kind && this.source === other.source && this.target === other.target
  }
}

/**
 * BindingSet: every declared relation and input of one configuration.
 *
 * Lists keep insertion order and hold no duplicates.
 *
 * @since 0.1.0
 * @category Models
 */
export class BindingSet extends Schema.Class<BindingSet>("BindingSet")({
  configuration: ConfigurationName,
  /** Raw UI variables consumed by equations and the primary simulation. */
  primaryInputs: Schema.Array(VariableName),
  /** Raw UI variables consumed by secondary modules. */
  secondaryInputs: Schema.Array(VariableName),
  /** Variables whose values come only from equations or modules. */
  evaluatedInputs: Schema.Array(VariableName),
  equations: Schema.Array(EquationInfo),
  secondaryModules: Schema.Array(SecondaryModuleInfo),
  relations: Schema.Array(Relation),
}) {
  /**
   * Relations of one kind, in insertion order.
   */
  relationsOf(kind: RelationKind): ReadonlyArray<Relation> {
    return this.relations.filter((relation) => relation.kind === kind)
  }

  /**
   * Declared inputs of one role.
   */
  inputsOf(role: InputRole): ReadonlyArray<string> {
    switch (role) {
      case "primary":
        return this.primaryInputs
      case "secondary":
        return this.secondaryInputs
      case "evaluated":
        return this.evaluatedInputs
    }
  }
}

/**
 * Configuration: a named technology/financial setup.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```typescript
 * const configuration = new Configuration({
 *   name: "Biopower-LCOE Calculator",
 *   pages: [],
 *   primaryModules: ["biomass", "lcoefcr"],
 *   secondaryModules: [],
 *   bindings: emptyBindingSet("Biopower-LCOE Calculator"),
 * })
 * ```
 */
export class Configuration extends Schema.Class<Configuration>("Configuration")({
  name: ConfigurationName,
  pages: Schema.Array(PageInfo),
  primaryModules: Schema.Array(Schema.NonEmptyTrimmedString),
  secondaryModules: Schema.Array(Schema.NonEmptyTrimmedString),
  bindings: BindingSet,
}) {
  /**
   * Every UI form of the configuration: each page's common forms, then its
   * exclusive forms, in page order.
   */
  forms(): ReadonlyArray<string> {
    return this.pages.flatMap((page) => [...page.commonForms, ...page.exclusiveForms])
  }
}
