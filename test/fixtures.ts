import { Layer, Logger, Option } from "effect"
import { ComputeRegistry, type ComputeFunctions } from "../src/Compute.js"
import { ResolverConfig } from "../src/Config.js"
import { registryLayer } from "../src/Loader.js"
import { asNumber, numberValue, type VarValue } from "../src/VarValue.js"

export const BIOPOWER = "Biopower-LCOE Calculator"
export const BIOPOWER_EFFICIENCY = "Biopower-Efficiency"
export const WIND = "Wind-Single Owner"
export const CYCLIC = "Cyclic"

export const numberOf = (value: VarValue | undefined): number => Option.getOrElse(asNumber(value), () => Number.NaN)

/**
 * Registry data shaped like the static data files: four configurations over
 * one shared catalog.
 */
export const registryData = {
  variables: [
    { name: "biomass_feed_rate_pct", description: "Feed rate as a fraction of capacity" },
    { name: "biomass_feed_rate" },
    { name: "efficiency_factor" },
    { name: "wind_turbine_rating", defaultValue: { _tag: "Number", value: 1500 } },
    { name: "turbine_rating" },
    { name: "rotorD" },
    { name: "wind_turbine_rotor_diameter" },
    { name: "rotor_area" },
    { name: "wind_turbine_rotor_area" },
    { name: "x" },
    { name: "y" },
  ],
  modules: [
    { name: "biomass", role: "primary", inputs: ["biomass_feed_rate"], outputs: [] },
    {
      name: "windpower",
      role: "primary",
      inputs: ["wind_turbine_rating", "wind_turbine_rotor_area"],
      outputs: [],
    },
    { name: "wind_rotor", role: "secondary", inputs: ["turbine_rating"], outputs: ["rotorD"] },
    { name: "loop_module", role: "secondary", inputs: ["y"], outputs: ["x"] },
  ],
  forms: [
    {
      name: "Feedstock",
      equations: [{ name: "feed_rate", inputs: ["biomass_feed_rate_pct"], outputs: ["biomass_feed_rate"] }],
      secondaryModules: [],
    },
    {
      name: "Feedstock Efficiency",
      equations: [
        {
          name: "feed_rate_with_efficiency",
          inputs: ["biomass_feed_rate_pct", "efficiency_factor"],
          outputs: ["biomass_feed_rate"],
        },
      ],
      secondaryModules: [],
    },
    {
      name: "Wind Turbine Design",
      equations: [{ name: "rotor_swept_area", inputs: ["wind_turbine_rotor_diameter"], outputs: ["rotor_area"] }],
      secondaryModules: [{ name: "wind_rotor", inputs: ["turbine_rating"], outputs: ["rotorD"] }],
    },
    {
      name: "Loop",
      equations: [{ name: "loop_eqn", inputs: ["x"], outputs: ["y"] }],
      secondaryModules: [{ name: "loop_module", inputs: ["y"], outputs: ["x"] }],
    },
  ],
  configurations: [
    {
      name: BIOPOWER,
      pages: [{ sidebarTitle: "Feedstock", commonForms: ["Feedstock"], exclusiveForms: [] }],
      primaryModules: ["biomass"],
      primaryInputs: ["biomass_feed_rate"],
      relations: [{ kind: "eqn_outputs_to_primary", source: "biomass_feed_rate", target: "biomass_feed_rate" }],
    },
    {
      name: BIOPOWER_EFFICIENCY,
      pages: [{ sidebarTitle: "Feedstock", commonForms: ["Feedstock Efficiency"], exclusiveForms: [] }],
      primaryModules: ["biomass"],
      relations: [{ kind: "eqn_outputs_to_primary", source: "biomass_feed_rate", target: "biomass_feed_rate" }],
    },
    {
      name: WIND,
      pages: [{ sidebarTitle: "Wind Turbine", commonForms: ["Wind Turbine Design"], exclusiveForms: [] }],
      primaryModules: ["windpower"],
      secondaryModules: ["wind_rotor"],
      primaryInputs: ["wind_turbine_rating"],
      evaluatedInputs: ["rotor_area"],
      relations: [
        { kind: "ui_to_secondary", source: "wind_turbine_rating", target: "turbine_rating" },
        { kind: "secondary_outputs_to_ui", source: "rotorD", target: "wind_turbine_rotor_diameter" },
        { kind: "eqn_outputs_to_primary", source: "rotor_area", target: "wind_turbine_rotor_area" },
      ],
    },
    {
      name: CYCLIC,
      pages: [{ sidebarTitle: "Loop", commonForms: ["Loop"], exclusiveForms: [] }],
      primaryModules: ["biomass"],
      secondaryModules: ["loop_module"],
      relations: [{ kind: "eqn_outputs_to_primary", source: "y", target: "biomass_feed_rate" }],
    },
  ],
}

export const computeFunctions: ComputeFunctions = {
  equations: {
    feed_rate: (inputs) => ({ biomass_feed_rate: numberValue(numberOf(inputs.biomass_feed_rate_pct) * 2) }),
    feed_rate_with_efficiency: (inputs) => ({
      biomass_feed_rate: numberValue(numberOf(inputs.biomass_feed_rate_pct) * numberOf(inputs.efficiency_factor)),
    }),
    rotor_swept_area: (inputs) => {
      const diameter = numberOf(inputs.wind_turbine_rotor_diameter)
      return { rotor_area: numberValue(diameter * diameter) }
    },
    loop_eqn: (inputs) => ({ y: numberValue(numberOf(inputs.x)) }),
  },
  modules: {
    wind_rotor: (inputs) => ({ rotorD: numberValue(numberOf(inputs.turbine_rating) / 15) }),
    loop_module: (inputs) => ({ x: numberValue(numberOf(inputs.y)) }),
  },
}

export const TestLayer = Layer.mergeAll(
  registryLayer(registryData),
  ComputeRegistry.layer(computeFunctions),
  ResolverConfig.layer(),
)

/**
 * A logger that records `LEVEL message` lines alongside the default one.
 */
export const captureLogs = () => {
  const lines: Array<string> = []
  const logger = Logger.make(({ logLevel, message }) => {
    const text = Array.isArray(message) ? message.map(String).join(" ") : String(message)
    lines.push(`${logLevel.label} ${text}`)
  })
  return { lines, layer: Logger.add(logger) }
}
