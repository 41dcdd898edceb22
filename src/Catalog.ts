/**
 * Variable Catalog.
 *
 * The catalog owns every variable definition along with the compute modules
 * and UI forms that reference variables. It is built once from static data
 * and read concurrently by every resolution afterwards; nothing in this
 * module mutates a catalog in place.
 *
 * @since 0.1.0
 */

import { Context, Layer, Option, Schema } from "effect"
import { EquationInfo, SecondaryModuleInfo } from "./Model.js"
import { ModuleRole, VariableName } from "./Types.js"
import { VarValue } from "./VarValue.js"

/**
 * Declared variable with its optional default value.
 *
 * @since 0.1.0
 * @category Models
 */
export class VariableDefinition extends Schema.Class<VariableDefinition>("VariableDefinition")({
  name: VariableName,
  defaultValue: Schema.optional(VarValue),
  description: Schema.optional(Schema.String),
}) {}

/**
 * Declared compute module. For a primary module, `inputs` is the input
 * contract the resolver has to satisfy.
 *
 * @since 0.1.0
 * @category Models
 */
export class ComputeModuleDefinition extends Schema.Class<ComputeModuleDefinition>(
  "ComputeModuleDefinition",
)({
  name: Schema.NonEmptyTrimmedString,
  role: ModuleRole,
  inputs: Schema.Array(VariableName),
  outputs: Schema.Array(VariableName),
}) {}

/**
 * Declared UI form with the equations and secondary module calls its script
 * performs.
 *
 * @since 0.1.0
 * @category Models
 */
export class UiFormDefinition extends Schema.Class<UiFormDefinition>("UiFormDefinition")({
  name: Schema.NonEmptyTrimmedString,
  equations: Schema.Array(EquationInfo),
  secondaryModules: Schema.Array(SecondaryModuleInfo),
}) {}

interface CatalogIndex {
  readonly variables: ReadonlyMap<string, VariableDefinition>
  readonly modules: ReadonlyMap<string, ComputeModuleDefinition>
  readonly forms: ReadonlyMap<string, UiFormDefinition>
  readonly references: ReadonlyMap<string, ReadonlyArray<string>>
}

const indexes = new WeakMap<VariableCatalog, CatalogIndex>()

const addReference = (references: Map<string, Set<string>>, variable: string, reference: string) => {
  const set = references.get(variable) ?? new Set<string>()
  set.add(reference)
  references.set(variable, set)
}

const buildIndex = (catalog: VariableCatalog): CatalogIndex => {
  const references = new Map<string, Set<string>>()

  for (const module of catalog.modules) {
    for (const name of [...module.inputs, ...module.outputs]) {
      addReference(references, name, `module:${module.name}`)
    }
  }

  for (const form of catalog.forms) {
    for (const equation of form.equations) {
      for (const name of [...equation.inputs, ...equation.outputs]) {
        addReference(references, name, `equation:${equation.name}`)
      }
    }
    for (const call of form.secondaryModules) {
      for (const name of [...call.inputs, ...call.outputs]) {
        addReference(references, name, `module:${call.name}`)
      }
    }
  }

  return {
    variables: new Map(catalog.variables.map((definition) => [definition.name, definition] as const)),
    modules: new Map(catalog.modules.map((definition) => [definition.name, definition] as const)),
    forms: new Map(catalog.forms.map((definition) => [definition.name, definition] as const)),
    references: new Map(
      Array.from(references, ([name, set]) => [name, Array.from(set).sort()] as const),
    ),
  }
}

/**
 * Immutable registry of variables, compute modules and UI forms. When a name
 * is defined twice the later definition wins.
 *
 * @since 0.1.0
 * @category Models
 */
export class VariableCatalog extends Schema.Class<VariableCatalog>("VariableCatalog")({
  variables: Schema.Array(VariableDefinition),
  modules: Schema.Array(ComputeModuleDefinition),
  forms: Schema.Array(UiFormDefinition),
}) {
  private get index(): CatalogIndex {
    const cached = indexes.get(this)
    if (cached) {
      return cached
    }
    const index = buildIndex(this)
    indexes.set(this, index)
    return index
  }

  /**
   * Lookup map keyed by variable name.
   */
  toMap(): ReadonlyMap<string, VariableDefinition> {
    return this.index.variables
  }

  has(name: string): boolean {
    return this.index.variables.has(name)
  }

  variable(name: string): Option.Option<VariableDefinition> {
    return Option.fromNullable(this.index.variables.get(name))
  }

  defaultOf(name: string): Option.Option<VarValue> {
    return Option.flatMap(this.variable(name), (definition) =>
      Option.fromNullable(definition.defaultValue),
    )
  }

  module(name: string): Option.Option<ComputeModuleDefinition> {
    return Option.fromNullable(this.index.modules.get(name))
  }

  form(name: string): Option.Option<UiFormDefinition> {
    return Option.fromNullable(this.index.forms.get(name))
  }

  /**
   * Equations and modules that read or write a variable, as sorted
   * `equation:<name>` / `module:<name>` references.
   */
  referencesOf(name: string): ReadonlyArray<string> {
    return this.index.references.get(name) ?? []
  }

  /**
   * Input names of the given primary modules, deduplicated, in module order.
   * Unknown or secondary modules contribute nothing.
   */
  primaryContract(moduleNames: ReadonlyArray<string>): ReadonlyArray<string> {
    const contract = new Set<string>()
    for (const name of moduleNames) {
      const module = this.index.modules.get(name)
      if (module?.role !== "primary") {
        continue
      }
      for (const input of module.inputs) {
        contract.add(input)
      }
    }
    return Array.from(contract)
  }
}

/**
 * Build a catalog from definitions.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeCatalog = (definitions: {
  readonly variables?: ReadonlyArray<VariableDefinition>
  readonly modules?: ReadonlyArray<ComputeModuleDefinition>
  readonly forms?: ReadonlyArray<UiFormDefinition>
}): VariableCatalog =>
  new VariableCatalog({
    variables: [...(definitions.variables ?? [])],
    modules: [...(definitions.modules ?? [])],
    forms: [...(definitions.forms ?? [])],
  })

/**
 * Append definitions to a catalog, producing a new catalog.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendCatalog = (
  catalog: VariableCatalog,
  definitions: {
    readonly variables?: ReadonlyArray<VariableDefinition>
    readonly modules?: ReadonlyArray<ComputeModuleDefinition>
    readonly forms?: ReadonlyArray<UiFormDefinition>
  },
): VariableCatalog =>
  new VariableCatalog({
    variables: [...catalog.variables, ...(definitions.variables ?? [])],
    modules: [...catalog.modules, ...(definitions.modules ?? [])],
    forms: [...catalog.forms, ...(definitions.forms ?? [])],
  })

/**
 * The process-wide catalog, provided once after loading.
 *
 * @category Services
 * @since 0.1.0
 */
export class Catalog extends Context.Tag("config-binding-resolver/Catalog")<Catalog, VariableCatalog>() {
  static layer(catalog: VariableCatalog) {
    return Layer.succeed(this, catalog)
  }
}
