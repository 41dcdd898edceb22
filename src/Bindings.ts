/**
 * Binding rules.
 *
 * Pure insertion operations over a `BindingSet`. Each operation returns a
 * new binding set or fails with the load-time error describing the bad
 * declaration, so malformed static data is caught when it is loaded rather
 * than when a configuration is resolved. Re-declaring something already
 * present returns the binding set unchanged.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { VariableCatalog } from "./Catalog.js"
import { ConflictingBindingError, UnknownVariableError } from "./Errors.js"
import { BindingSet, EquationInfo, Relation, SecondaryModuleInfo } from "./Model.js"
import { isVariableBinding, type InputRole, type RelationKind } from "./Types.js"

/**
 * A binding set with nothing declared.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const emptyBindingSet = (configuration: string): BindingSet =>
  new BindingSet({
    configuration,
    primaryInputs: [],
    secondaryInputs: [],
    evaluatedInputs: [],
    equations: [],
    secondaryModules: [],
    relations: [],
  })

const isRaw = (role: InputRole): boolean => role === "primary" || role === "secondary"

const conflictingRole = (bindings: BindingSet, role: InputRole, variable: string): InputRole | undefined => {
  if (isRaw(role)) {
    return bindings.evaluatedInputs.includes(variable) ? "evaluated" : undefined
  }
  if (bindings.primaryInputs.includes(variable)) {
    return "primary"
  }
  return bindings.secondaryInputs.includes(variable) ? "secondary" : undefined
}

/**
 * Declare a variable as a primary, secondary or evaluated input. A variable
 * cannot be both a raw input and an evaluated input.
 *
 * @category Rules
 * @since 0.1.0
 */
export const declareInput = (
  bindings: BindingSet,
  role: InputRole,
  variable: string,
): Effect.Effect<BindingSet, ConflictingBindingError> => {
  if (bindings.inputsOf(role).includes(variable)) {
    return Effect.succeed(bindings)
  }
  const conflict = conflictingRole(bindings, role, variable)
  if (conflict !== undefined) {
    return Effect.fail(
      new ConflictingBindingError({
        configuration: bindings.configuration,
        variable,
        reason: `declared as both ${conflict} and ${role} input`,
      }),
    )
  }
  return Effect.succeed(
    new BindingSet({
      ...bindings,
      primaryInputs: role === "primary" ? [...bindings.primaryInputs, variable] : bindings.primaryInputs,
      secondaryInputs:
        role === "secondary" ? [...bindings.secondaryInputs, variable] : bindings.secondaryInputs,
      evaluatedInputs:
        role === "evaluated" ? [...bindings.evaluatedInputs, variable] : bindings.evaluatedInputs,
    }),
  )
}

/**
 * Insert a relation. The target must be a catalog variable; a
 * variable-to-variable relation must not bind a variable to itself.
 *
 * @category Rules
 * @since 0.1.0
 */
export const addRelation = (
  catalog: VariableCatalog,
  bindings: BindingSet,
  kind: RelationKind,
  source: string,
  target: string,
): Effect.Effect<BindingSet, UnknownVariableError | ConflictingBindingError> => {
  const relation = new Relation({ kind, source, target })
  if (bindings.relations.some((existing) => existing.sameAs(relation))) {
    return Effect.succeed(bindings)
  }
  if (!catalog.has(target)) {
    return Effect.fail(
      new UnknownVariableError({ configuration: bindings.configuration, variable: target, relation: kind }),
    )
  }
  if (isVariableBinding(kind) && source === target) {
    return Effect.fail(
      new ConflictingBindingError({
        configuration: bindings.configuration,
        variable: source,
        reason: `${kind} binds the variable to itself`,
      }),
    )
  }
  return Effect.succeed(new BindingSet({ ...bindings, relations: [...bindings.relations, relation] }))
}

/**
 * Append an equation. Equation names are unique within a configuration.
 *
 * @category Rules
 * @since 0.1.0
 */
export const addEquation = (
  bindings: BindingSet,
  equation: EquationInfo,
): Effect.Effect<BindingSet, ConflictingBindingError> =>
  bindings.equations.some((existing) => existing.name === equation.name)
    ? Effect.fail(
        new ConflictingBindingError({
          configuration: bindings.configuration,
          variable: equation.outputs[0] ?? equation.name,
          reason: `equation "${equation.name}" is declared twice`,
        }),
      )
    : Effect.succeed(new BindingSet({ ...bindings, equations: [...bindings.equations, equation] }))

/**
 * Append a secondary module call. The module must be one of the
 * configuration's secondary modules and may be called once.
 *
 * @category Rules
 * @since 0.1.0
 */
export const addSecondaryModule = (
  bindings: BindingSet,
  call: SecondaryModuleInfo,
  declaredModules: ReadonlyArray<string>,
): Effect.Effect<BindingSet, ConflictingBindingError> => {
  const variable = call.outputs[0] ?? call.name
  if (!declaredModules.includes(call.name)) {
    return Effect.fail(
      new ConflictingBindingError({
        configuration: bindings.configuration,
        variable,
        reason: `module "${call.name}" is not a secondary module of the configuration`,
      }),
    )
  }
  if (bindings.secondaryModules.some((existing) => existing.name === call.name)) {
    return Effect.fail(
      new ConflictingBindingError({
        configuration: bindings.configuration,
        variable,
        reason: `module "${call.name}" is called twice`,
      }),
    )
  }
  return Effect.succeed(
    new BindingSet({ ...bindings, secondaryModules: [...bindings.secondaryModules, call] }),
  )
}

/**
 * Rebuild a binding set through the rules above, failing on the first
 * declaration that breaks an invariant. Duplicates collapse.
 *
 * @category Rules
 * @since 0.1.0
 */
export const validateBindingSet = (
  catalog: VariableCatalog,
  bindings: BindingSet,
  declaredModules: ReadonlyArray<string>,
): Effect.Effect<BindingSet, UnknownVariableError | ConflictingBindingError> =>
  Effect.gen(function* () {
    let next = emptyBindingSet(bindings.configuration)
    for (const variable of bindings.primaryInputs) {
      next = yield* declareInput(next, "primary", variable)
    }
    for (const variable of bindings.secondaryInputs) {
      next = yield* declareInput(next, "secondary", variable)
    }
    for (const variable of bindings.evaluatedInputs) {
      next = yield* declareInput(next, "evaluated", variable)
    }
    for (const equation of bindings.equations) {
      next = yield* addEquation(next, equation)
    }
    for (const call of bindings.secondaryModules) {
      next = yield* addSecondaryModule(next, call, declaredModules)
    }
    for (const relation of bindings.relations) {
      next = yield* addRelation(catalog, next, relation.kind, relation.source, relation.target)
    }
    return next
  })
