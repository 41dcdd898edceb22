import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"
import {
  Catalog,
  ComputeModuleDefinition,
  UiFormDefinition,
  VariableDefinition,
  extendCatalog,
  makeCatalog,
} from "../src/Catalog.js"
import { EquationInfo, SecondaryModuleInfo } from "../src/Model.js"
import { numberValue } from "../src/VarValue.js"

const catalog = makeCatalog({
  variables: [
    new VariableDefinition({ name: "system_capacity", defaultValue: numberValue(50) }),
    new VariableDefinition({ name: "rotorD", description: "Rotor diameter" }),
  ],
  modules: [
    new ComputeModuleDefinition({
      name: "windpower",
      role: "primary",
      inputs: ["wind_turbine_rating", "system_capacity"],
      outputs: [],
    }),
    new ComputeModuleDefinition({
      name: "lcoefcr",
      role: "primary",
      inputs: ["system_capacity", "fixed_charge_rate"],
      outputs: ["lcoe"],
    }),
    new ComputeModuleDefinition({ name: "wind_rotor", role: "secondary", inputs: ["turbine_rating"], outputs: ["rotorD"] }),
  ],
  forms: [
    new UiFormDefinition({
      name: "Wind Turbine Design",
      equations: [new EquationInfo({ name: "rotor_swept_area", inputs: ["rotorD"], outputs: ["rotor_area"] })],
      secondaryModules: [new SecondaryModuleInfo({ name: "wind_rotor", inputs: ["turbine_rating"], outputs: ["rotorD"] })],
    }),
  ],
})

describe("VariableCatalog", () => {
  it("looks up variables and their defaults", () => {
    expect(catalog.has("rotorD")).toBe(true)
    expect(catalog.has("rotor_area")).toBe(false)
    expect(catalog.defaultOf("system_capacity")).toStrictEqual(Option.some(numberValue(50)))
    expect(catalog.defaultOf("rotorD")).toStrictEqual(Option.none())
    expect(Option.map(catalog.variable("rotorD"), (definition) => definition.description)).toStrictEqual(
      Option.some("Rotor diameter"),
    )
    expect(Array.from(catalog.toMap().keys())).toStrictEqual(["system_capacity", "rotorD"])
  })

  it("looks up modules and forms by name", () => {
    expect(Option.map(catalog.module("wind_rotor"), (module) => module.role)).toStrictEqual(
      Option.some("secondary"),
    )
    expect(Option.isNone(catalog.module("pvwatts"))).toBe(true)
    expect(Option.isSome(catalog.form("Wind Turbine Design"))).toBe(true)
  })

  it("lists the equations and modules touching a variable", () => {
    expect(catalog.referencesOf("rotorD")).toStrictEqual(["equation:rotor_swept_area", "module:wind_rotor"])
    expect(catalog.referencesOf("unused")).toStrictEqual([])
  })

  it("builds the primary input contract from primary modules only", () => {
    expect(catalog.primaryContract(["windpower", "lcoefcr", "wind_rotor", "missing"])).toStrictEqual([
      "wind_turbine_rating",
      "system_capacity",
      "fixed_charge_rate",
    ])
  })

  it("lets later definitions win when extended", () => {
    const extended = extendCatalog(catalog, {
      variables: [new VariableDefinition({ name: "system_capacity", defaultValue: numberValue(75) })],
    })

    expect(extended.defaultOf("system_capacity")).toStrictEqual(Option.some(numberValue(75)))
    expect(catalog.defaultOf("system_capacity")).toStrictEqual(Option.some(numberValue(50)))
  })

  it.effect("is provided as a service", () =>
    Effect.gen(function* () {
      const provided = yield* Catalog
      expect(provided.has("system_capacity")).toBe(true)
    }).pipe(Effect.provide(Catalog.layer(catalog))),
  )
})
