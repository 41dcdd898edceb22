import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import {
  addEquation,
  addRelation,
  addSecondaryModule,
  declareInput,
  emptyBindingSet,
  validateBindingSet,
} from "../src/Bindings.js"
import { VariableDefinition, makeCatalog } from "../src/Catalog.js"
import { BindingSet, EquationInfo, Relation, SecondaryModuleInfo } from "../src/Model.js"

const catalog = makeCatalog({
  variables: ["biomass_feed_rate", "turbine_rating", "wind_turbine_rating"].map(
    (name) => new VariableDefinition({ name }),
  ),
})

const CONFIGURATION = "Biopower-LCOE Calculator"

describe("binding rules", () => {
  it.effect("ignores a repeated input declaration", () =>
    Effect.gen(function* () {
      const once = yield* declareInput(emptyBindingSet(CONFIGURATION), "primary", "biomass_feed_rate_pct")
      const twice = yield* declareInput(once, "primary", "biomass_feed_rate_pct")

      expect(twice).toBe(once)
      expect(twice.primaryInputs).toStrictEqual(["biomass_feed_rate_pct"])
    }),
  )

  it.effect("refuses a variable that is both raw and evaluated", () =>
    Effect.gen(function* () {
      const bindings = yield* declareInput(emptyBindingSet(CONFIGURATION), "secondary", "rotor_area")
      const error = yield* Effect.flip(declareInput(bindings, "evaluated", "rotor_area"))

      expect(error._tag).toBe("ConflictingBindingError")
      expect(error.variable).toBe("rotor_area")
      expect(error.reason).toBe("declared as both secondary and evaluated input")
    }),
  )

  it.effect("refuses a relation whose target is not in the catalog", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        addRelation(catalog, emptyBindingSet(CONFIGURATION), "eqn_outputs_to_primary", "x", "not_a_variable"),
      )

      expect(error._tag).toBe("UnknownVariableError")
      expect(error.message).toBe(
        'Configuration "Biopower-LCOE Calculator": eqn_outputs_to_primary targets unknown variable "not_a_variable"',
      )
    }),
  )

  it.effect("accepts an identity relation into a primary input", () =>
    Effect.gen(function* () {
      const bindings = yield* addRelation(
        catalog,
        emptyBindingSet(CONFIGURATION),
        "eqn_outputs_to_primary",
        "biomass_feed_rate",
        "biomass_feed_rate",
      )
      const again = yield* addRelation(
        catalog,
        bindings,
        "eqn_outputs_to_primary",
        "biomass_feed_rate",
        "biomass_feed_rate",
      )

      expect(again).toBe(bindings)
      expect(again.relations).toHaveLength(1)
    }),
  )

  it.effect("refuses a variable bound to itself", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        addRelation(catalog, emptyBindingSet("Wind"), "ui_to_secondary", "turbine_rating", "turbine_rating"),
      )

      expect(error._tag).toBe("ConflictingBindingError")
      expect(error.message).toBe(
        'Configuration "Wind": conflicting binding for "turbine_rating": ui_to_secondary binds the variable to itself',
      )
    }),
  )

  it.effect("refuses an equation declared twice", () =>
    Effect.gen(function* () {
      const equation = new EquationInfo({ name: "feed_rate", inputs: ["pct"], outputs: ["rate"] })
      const bindings = yield* addEquation(emptyBindingSet(CONFIGURATION), equation)
      const error = yield* Effect.flip(addEquation(bindings, equation))

      expect(error.variable).toBe("rate")
      expect(error.reason).toBe('equation "feed_rate" is declared twice')
    }),
  )

  it.effect("only calls declared secondary modules, once each", () =>
    Effect.gen(function* () {
      const call = new SecondaryModuleInfo({ name: "wind_rotor", inputs: ["turbine_rating"], outputs: ["rotorD"] })
      const undeclared = yield* Effect.flip(addSecondaryModule(emptyBindingSet("Wind"), call, []))
      const bindings = yield* addSecondaryModule(emptyBindingSet("Wind"), call, ["wind_rotor"])
      const twice = yield* Effect.flip(addSecondaryModule(bindings, call, ["wind_rotor"]))

      expect(undeclared.reason).toBe('module "wind_rotor" is not a secondary module of the configuration')
      expect(twice.reason).toBe('module "wind_rotor" is called twice')
      expect(bindings.secondaryModules.map((module) => module.name)).toStrictEqual(["wind_rotor"])
    }),
  )

  it.effect("validates a whole binding set and collapses duplicates", () =>
    Effect.gen(function* () {
      const relation = new Relation({ kind: "ui_to_secondary", source: "wind_turbine_rating", target: "turbine_rating" })
      const bindings = new BindingSet({
        configuration: "Wind",
        primaryInputs: ["wind_turbine_rating", "wind_turbine_rating"],
        secondaryInputs: [],
        evaluatedInputs: [],
        equations: [],
        secondaryModules: [],
        relations: [relation, relation],
      })

      const validated = yield* validateBindingSet(catalog, bindings, [])

      expect(validated.primaryInputs).toStrictEqual(["wind_turbine_rating"])
      expect(validated.relations).toHaveLength(1)
      expect(validated.relationsOf("ui_to_secondary")).toHaveLength(1)
      expect(validated.relationsOf("ssc_to_eval")).toHaveLength(0)
    }),
  )
})
