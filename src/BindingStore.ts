/**
 * Binding Store service.
 *
 * Holds the registered configurations and their binding sets. Writes run
 * under a synchronized reference, so a configuration is always observed
 * either before or after a whole insertion; readers get immutable snapshots
 * and never block each other.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, SynchronizedRef } from "effect"
import {
  addEquation,
  addRelation,
  addSecondaryModule,
  declareInput,
  validateBindingSet,
} from "./Bindings.js"
import { Catalog, type VariableCatalog } from "./Catalog.js"
import {
  ConflictingBindingError,
  DuplicateConfigurationError,
  UnknownConfigurationError,
  UnknownVariableError,
} from "./Errors.js"
import { BindingSet, Configuration, EquationInfo, SecondaryModuleInfo } from "./Model.js"
import type { InputRole, RelationKind } from "./Types.js"

type Entries = ReadonlyMap<string, Configuration>

/**
 * @since 0.1.0
 * @category Services
 */
export interface BindingStoreService {
  readonly register: (
    configuration: Configuration,
  ) => Effect.Effect<
    Configuration,
    DuplicateConfigurationError | UnknownVariableError | ConflictingBindingError
  >
  readonly configurations: Effect.Effect<ReadonlyArray<Configuration>>
  readonly getConfiguration: (name: string) => Effect.Effect<Configuration, UnknownConfigurationError>
  readonly getBindingSet: (name: string) => Effect.Effect<BindingSet, UnknownConfigurationError>
  readonly addBinding: (
    name: string,
    kind: RelationKind,
    source: string,
    target: string,
  ) => Effect.Effect<BindingSet, UnknownConfigurationError | UnknownVariableError | ConflictingBindingError>
  readonly declareInput: (
    name: string,
    role: InputRole,
    variable: string,
  ) => Effect.Effect<BindingSet, UnknownConfigurationError | ConflictingBindingError>
  readonly addEquation: (
    name: string,
    equation: EquationInfo,
  ) => Effect.Effect<BindingSet, UnknownConfigurationError | ConflictingBindingError>
  readonly addSecondaryModule: (
    name: string,
    call: SecondaryModuleInfo,
  ) => Effect.Effect<BindingSet, UnknownConfigurationError | ConflictingBindingError>
}

const lookup = (entries: Entries, name: string): Effect.Effect<Configuration, UnknownConfigurationError> => {
  const configuration = entries.get(name)
  return configuration
    ? Effect.succeed(configuration)
    : Effect.fail(new UnknownConfigurationError({ configuration: name }))
}

const withBindings = (configuration: Configuration, bindings: BindingSet): Configuration =>
  new Configuration({ ...configuration, bindings })

const makeService = (catalog: VariableCatalog, ref: SynchronizedRef.SynchronizedRef<Entries>) => {
  const update = <E>(
    name: string,
    f: (configuration: Configuration) => Effect.Effect<BindingSet, E>,
  ): Effect.Effect<BindingSet, E | UnknownConfigurationError> =>
    SynchronizedRef.modifyEffect(ref, (entries) =>
      Effect.gen(function* () {
        const configuration = yield* lookup(entries, name)
        const bindings = yield* f(configuration)
        const next = new Map(entries)
        next.set(name, withBindings(configuration, bindings))
        return [bindings, next] as const
      }),
    )

  const register = (configuration: Configuration) =>
    SynchronizedRef.modifyEffect(ref, (entries) =>
      Effect.gen(function* () {
        if (entries.has(configuration.name)) {
          return yield* new DuplicateConfigurationError({ configuration: configuration.name })
        }
        const bindings = yield* validateBindingSet(
          catalog,
          configuration.bindings,
          configuration.secondaryModules,
        )
        const registered = withBindings(configuration, bindings)
        const next = new Map(entries)
        next.set(registered.name, registered)
        return [registered, next] as const
      }),
    ).pipe(Effect.tap((registered) => Effect.logDebug(`registered configuration "${registered.name}"`)))

  const service: BindingStoreService = {
    register,
    configurations: Effect.map(SynchronizedRef.get(ref), (entries) => Array.from(entries.values())),
    getConfiguration: (name) => Effect.flatMap(SynchronizedRef.get(ref), (entries) => lookup(entries, name)),
    getBindingSet: (name) =>
      Effect.map(
        Effect.flatMap(SynchronizedRef.get(ref), (entries) => lookup(entries, name)),
        (configuration) => configuration.bindings,
      ),
    addBinding: (name, kind, source, target) =>
      update(name, (configuration) => addRelation(catalog, configuration.bindings, kind, source, target)),
    declareInput: (name, role, variable) =>
      update(name, (configuration) => declareInput(configuration.bindings, role, variable)),
    addEquation: (name, equation) =>
      update(name, (configuration) => addEquation(configuration.bindings, equation)),
    addSecondaryModule: (name, call) =>
      update(name, (configuration) =>
        addSecondaryModule(configuration.bindings, call, configuration.secondaryModules),
      ),
  }

  return service
}

/**
 * Per-configuration binding storage, validated against the `Catalog`.
 *
 * @category Services
 * @since 0.1.0
 */
export class BindingStore extends Context.Tag("config-binding-resolver/BindingStore")<
  BindingStore,
  BindingStoreService
>() {
  /**
   * A store pre-populated with already validated configurations. They are
   * validated again on the way in; a failure here is a defect.
   */
  static layer(initial: ReadonlyArray<Configuration> = []) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const catalog = yield* Catalog
        const ref = yield* SynchronizedRef.make<Entries>(new Map())
        const service = makeService(catalog, ref)
        yield* Effect.forEach(initial, service.register, { discard: true }).pipe(Effect.orDie)
        return service
      }),
    )
  }
}
