/**
 * Static registry loading.
 *
 * Decodes JSON-shaped registry data, builds the catalog, and assembles each
 * configuration's binding set from the forms on its pages. Configurations
 * load independently: one that breaks an invariant is reported and skipped
 * while the others are kept.
 *
 * @since 0.1.0
 */

import { Effect, Either, Layer, Schema } from "effect"
import type { ParseResult } from "effect"
import { addEquation, addRelation, addSecondaryModule, declareInput, emptyBindingSet } from "./Bindings.js"
import { BindingStore } from "./BindingStore.js"
import {
  Catalog,
  ComputeModuleDefinition,
  UiFormDefinition,
  VariableCatalog,
  VariableDefinition,
  makeCatalog,
} from "./Catalog.js"
import {
  DuplicateConfigurationError,
  UnknownFormError,
  UnknownModuleError,
  type LoadError,
} from "./Errors.js"
import { BindingSet, Configuration, EquationInfo, PageInfo, Relation, SecondaryModuleInfo } from "./Model.js"
import { ConfigurationName, VariableName } from "./Types.js"

/**
 * Declarative data of one configuration.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const ConfigurationSource = Schema.Struct({
  name: ConfigurationName,
  pages: Schema.Array(PageInfo),
  primaryModules: Schema.Array(Schema.NonEmptyTrimmedString),
  secondaryModules: Schema.optionalWith(Schema.Array(Schema.NonEmptyTrimmedString), { default: () => [] }),
  primaryInputs: Schema.optionalWith(Schema.Array(VariableName), { default: () => [] }),
  secondaryInputs: Schema.optionalWith(Schema.Array(VariableName), { default: () => [] }),
  evaluatedInputs: Schema.optionalWith(Schema.Array(VariableName), { default: () => [] }),
  relations: Schema.optionalWith(Schema.Array(Relation), { default: () => [] }),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export type ConfigurationSource = Schema.Schema.Type<typeof ConfigurationSource>

/**
 * Complete registry data: catalog contents plus configurations.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const RegistrySource = Schema.Struct({
  variables: Schema.Array(VariableDefinition),
  modules: Schema.optionalWith(Schema.Array(ComputeModuleDefinition), { default: () => [] }),
  forms: Schema.optionalWith(Schema.Array(UiFormDefinition), { default: () => [] }),
  configurations: Schema.Array(ConfigurationSource),
})

/**
 * @since 0.1.0
 * @category Schemas
 */
export type RegistrySource = Schema.Schema.Type<typeof RegistrySource>

/**
 * A configuration that failed to load.
 *
 * @since 0.1.0
 * @category Loading
 */
export interface LoadFailure {
  readonly configuration: string
  readonly error: LoadError
}

/**
 * Result of a registry load.
 *
 * @since 0.1.0
 * @category Loading
 */
export interface LoadedRegistry {
  readonly catalog: VariableCatalog
  readonly configurations: ReadonlyArray<Configuration>
  readonly failures: ReadonlyArray<LoadFailure>
}

/**
 * Equations and module calls gathered while walking a configuration's forms.
 * `activeForm` is the form currently being read; each walk owns its own
 * accumulator.
 */
interface FormAccumulator {
  readonly activeForm: string | undefined
  readonly visited: ReadonlySet<string>
  readonly equations: ReadonlyArray<EquationInfo>
  readonly secondaryModules: ReadonlyArray<SecondaryModuleInfo>
}

const emptyAccumulator: FormAccumulator = {
  activeForm: undefined,
  visited: new Set(),
  equations: [],
  secondaryModules: [],
}

const collectForm = (
  accumulator: FormAccumulator,
  form: UiFormDefinition,
  secondaryModules: ReadonlyArray<string>,
): FormAccumulator => {
  if (accumulator.visited.has(form.name)) {
    return accumulator
  }
  const active = { ...accumulator, activeForm: form.name }
  return {
    ...active,
    visited: new Set([...active.visited, form.name]),
    equations: [
      ...active.equations,
      ...form.equations.map((equation) => new EquationInfo({ ...equation, uiForm: active.activeForm })),
    ],
    secondaryModules: [
      ...active.secondaryModules,
      ...form.secondaryModules
        .filter((call) => secondaryModules.includes(call.name))
        .map((call) => new SecondaryModuleInfo({ ...call, uiForm: active.activeForm })),
    ],
  }
}

const checkModules = (
  catalog: VariableCatalog,
  source: ConfigurationSource,
): Effect.Effect<void, UnknownModuleError> =>
  Effect.forEach(
    [
      ...source.primaryModules.map((module) => ({ module, role: "primary" as const })),
      ...source.secondaryModules.map((module) => ({ module, role: "secondary" as const })),
    ],
    ({ module, role }) => {
      const definition = catalog.module(module)
      return definition._tag === "Some" && definition.value.role === role
        ? Effect.void
        : Effect.fail(new UnknownModuleError({ configuration: source.name, module, role }))
    },
    { discard: true },
  )

const collectForms = (
  catalog: VariableCatalog,
  source: ConfigurationSource,
  pages: ReadonlyArray<PageInfo>,
): Effect.Effect<FormAccumulator, UnknownFormError> =>
  Effect.reduce(
    pages.flatMap((page) => [...page.commonForms, ...page.exclusiveForms]),
    emptyAccumulator,
    (accumulator, name) => {
      const form = catalog.form(name)
      return form._tag === "Some"
        ? Effect.succeed(collectForm(accumulator, form.value, source.secondaryModules))
        : Effect.fail(new UnknownFormError({ configuration: source.name, form: name }))
    },
  )

/**
 * Assemble one configuration from its declarative data.
 *
 * @category Loading
 * @since 0.1.0
 */
export const buildConfiguration = (
  catalog: VariableCatalog,
  source: ConfigurationSource,
): Effect.Effect<Configuration, Exclude<LoadError, DuplicateConfigurationError>> =>
  Effect.gen(function* () {
    yield* checkModules(catalog, source)
    const collected = yield* collectForms(catalog, source, source.pages)

    let bindings: BindingSet = emptyBindingSet(source.name)
    for (const variable of source.primaryInputs) {
      bindings = yield* declareInput(bindings, "primary", variable)
    }
    for (const variable of source.secondaryInputs) {
      bindings = yield* declareInput(bindings, "secondary", variable)
    }
    for (const variable of source.evaluatedInputs) {
      bindings = yield* declareInput(bindings, "evaluated", variable)
    }
    for (const equation of collected.equations) {
      bindings = yield* addEquation(bindings, equation)
    }
    for (const call of collected.secondaryModules) {
      bindings = yield* addSecondaryModule(bindings, call, source.secondaryModules)
    }
    for (const relation of source.relations) {
      bindings = yield* addRelation(catalog, bindings, relation.kind, relation.source, relation.target)
    }

    return new Configuration({
      name: source.name,
      pages: source.pages,
      primaryModules: source.primaryModules,
      secondaryModules: source.secondaryModules,
      bindings,
    })
  })

/**
 * Decode registry data and build every configuration. Malformed data fails
 * the whole load; a configuration that breaks an invariant is logged and
 * reported in `failures`.
 *
 * @category Loading
 * @since 0.1.0
 */
export const loadRegistry = (input: unknown): Effect.Effect<LoadedRegistry, ParseResult.ParseError> =>
  Effect.gen(function* () {
    const source = yield* Schema.decodeUnknown(RegistrySource)(input)
    const catalog = makeCatalog(source)
    const configurations: Array<Configuration> = []
    const failures: Array<LoadFailure> = []
    const seen = new Set<string>()

    for (const entry of source.configurations) {
      const result: Either.Either<Configuration, LoadError> = seen.has(entry.name)
        ? Either.left(new DuplicateConfigurationError({ configuration: entry.name }))
        : yield* Effect.either(buildConfiguration(catalog, entry))
      seen.add(entry.name)

      if (Either.isLeft(result)) {
        failures.push({ configuration: entry.name, error: result.left })
        yield* Effect.logError(`configuration skipped: ${result.left.message}`).pipe(
          Effect.annotateLogs({ configuration: entry.name, error: result.left._tag }),
        )
        continue
      }
      configurations.push(result.right)
    }

    yield* Effect.logDebug(
      `loaded ${configurations.length} configuration(s), ${failures.length} failure(s)`,
    )
    return { catalog, configurations, failures }
  })

/**
 * Layer providing the `Catalog` and a `BindingStore` populated from registry
 * data.
 *
 * @category Loading
 * @since 0.1.0
 */
export const registryLayer = (input: unknown): Layer.Layer<Catalog | BindingStore, ParseResult.ParseError> =>
  Layer.unwrapEffect(
    Effect.map(loadRegistry(input), (loaded) =>
      BindingStore.layer(loaded.configurations).pipe(Layer.provideMerge(Catalog.layer(loaded.catalog))),
    ),
  )
