import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import { BindingStore } from "../src/BindingStore.js"
import { Catalog } from "../src/Catalog.js"
import { loadRegistry, registryLayer } from "../src/Loader.js"
import { BIOPOWER, BIOPOWER_EFFICIENCY, CYCLIC, WIND, captureLogs, registryData } from "./fixtures.js"

const withConfigurations = (configurations: ReadonlyArray<unknown>) => ({ ...registryData, configurations })

describe("loadRegistry", () => {
  it.effect("builds every configuration of valid data", () =>
    Effect.gen(function* () {
      const loaded = yield* loadRegistry(registryData)

      expect(loaded.failures).toStrictEqual([])
      expect(loaded.configurations.map((configuration) => configuration.name)).toStrictEqual([
        BIOPOWER,
        BIOPOWER_EFFICIENCY,
        WIND,
        CYCLIC,
      ])
      expect(loaded.catalog.has("rotorD")).toBe(true)
    }),
  )

  it.effect("collects equations and module calls from the configuration's forms", () =>
    Effect.gen(function* () {
      const loaded = yield* loadRegistry(registryData)
      const wind = loaded.configurations.find((configuration) => configuration.name === WIND)

      expect(wind?.forms()).toStrictEqual(["Wind Turbine Design"])
      expect(wind?.bindings.equations.map((equation) => [equation.name, equation.uiForm])).toStrictEqual([
        ["rotor_swept_area", "Wind Turbine Design"],
      ])
      expect(wind?.bindings.secondaryModules.map((call) => [call.name, call.uiForm])).toStrictEqual([
        ["wind_rotor", "Wind Turbine Design"],
      ])
      expect(wind?.bindings.primaryInputs).toStrictEqual(["wind_turbine_rating"])
      expect(wind?.bindings.evaluatedInputs).toStrictEqual(["rotor_area"])
      expect(wind?.bindings.relations).toHaveLength(3)
    }),
  )

  it.effect("collects a form shown twice only once and skips undeclared module calls", () =>
    Effect.gen(function* () {
      const loaded = yield* loadRegistry(
        withConfigurations([
          {
            name: "Wind-No Rotor",
            pages: [
              { sidebarTitle: "Turbine", commonForms: ["Wind Turbine Design"], exclusiveForms: [] },
              {
                sidebarTitle: "Options",
                commonForms: [],
                exclusiveVariable: "wind_turbine_rating",
                exclusiveForms: ["Wind Turbine Design"],
              },
            ],
            primaryModules: ["windpower"],
          },
        ]),
      )
      const [configuration] = loaded.configurations

      expect(configuration?.forms()).toStrictEqual(["Wind Turbine Design", "Wind Turbine Design"])
      expect(configuration?.bindings.equations.map((equation) => equation.name)).toStrictEqual(["rotor_swept_area"])
      expect(configuration?.bindings.secondaryModules).toStrictEqual([])
    }),
  )

  it.effect("reports broken configurations and keeps the others", () => {
    const logs = captureLogs()
    return Effect.gen(function* () {
      const loaded = yield* loadRegistry(
        withConfigurations([
          ...registryData.configurations.slice(0, 1),
          { name: "Bad-Form", pages: [{ sidebarTitle: "P", commonForms: ["Nowhere"], exclusiveForms: [] }], primaryModules: ["biomass"] },
          { name: "Bad-Module", pages: [], primaryModules: ["wind_rotor"] },
          {
            name: "Bad-Target",
            pages: [],
            primaryModules: ["biomass"],
            relations: [{ kind: "ssc_to_eval", source: "a", target: "not_a_variable" }],
          },
          {
            name: "Bad-Role",
            pages: [],
            primaryModules: ["biomass"],
            primaryInputs: ["rotor_area"],
            evaluatedInputs: ["rotor_area"],
          },
          ...registryData.configurations.slice(0, 1),
        ]),
      )

      expect(loaded.configurations.map((configuration) => configuration.name)).toStrictEqual([BIOPOWER])
      expect(loaded.failures.map((failure) => [failure.configuration, failure.error._tag])).toStrictEqual([
        ["Bad-Form", "UnknownFormError"],
        ["Bad-Module", "UnknownModuleError"],
        ["Bad-Target", "UnknownVariableError"],
        ["Bad-Role", "ConflictingBindingError"],
        [BIOPOWER, "DuplicateConfigurationError"],
      ])
      expect(loaded.failures[1]?.error.message).toBe(
        'Configuration "Bad-Module" references unknown primary module "wind_rotor"',
      )
      expect(logs.lines).toContain(
        'ERROR configuration skipped: Configuration "Bad-Form" references unknown UI form "Nowhere"',
      )
    }).pipe(Effect.provide(logs.layer))
  })

  it.effect("fails the whole load on malformed data", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(loadRegistry({ variables: "none", configurations: [] }))
      expect(error._tag).toBe("ParseError")
    }),
  )

  it.effect("provides the catalog and a populated store as layers", () =>
    Effect.gen(function* () {
      const store = yield* BindingStore
      const catalog = yield* Catalog
      const configurations = yield* store.configurations

      expect(configurations).toHaveLength(4)
      expect(catalog.primaryContract(["windpower"])).toStrictEqual(["wind_turbine_rating", "wind_turbine_rotor_area"])
    }).pipe(Effect.provide(registryLayer(registryData))),
  )
})
