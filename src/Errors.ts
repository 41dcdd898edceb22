/**
 * Error taxonomy for configuration binding resolution.
 *
 * Load-time errors describe malformed static data and abort the offending
 * configuration only. Resolution-time errors are reported per `resolve` call
 * and are recoverable by the caller. `MissingPrimaryInputError` signals a
 * broken internal invariant and travels through the defect channel.
 *
 * Every error is a tagged class so callers can pattern match with
 * `Effect.catchTag`; the structured fields name the declarative data to fix.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { InvocationId, RelationKind } from "./Types.js"

/**
 * Raised when a configuration name is not registered.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new UnknownConfigurationError({ configuration: "PV-None" })
 * yield* Effect.fail(error)
 * ```
 */
export class UnknownConfigurationError extends Data.TaggedError("UnknownConfigurationError")<{
  readonly configuration: string
}> {
  override get message(): string {
    return `Unknown configuration "${this.configuration}"`
  }
}

/**
 * Raised when a relation targets a variable missing from the catalog.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownVariableError extends Data.TaggedError("UnknownVariableError")<{
  readonly configuration: string
  readonly variable: string
  readonly relation: RelationKind
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": ${this.relation} targets unknown variable "${this.variable}"`
  }
}

/**
 * Raised when declarations disagree about where a variable's value comes
 * from, or when an invocation is declared twice.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ConflictingBindingError extends Data.TaggedError("ConflictingBindingError")<{
  readonly configuration: string
  readonly variable: string
  readonly reason: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": conflicting binding for "${this.variable}": ${this.reason}`
  }
}

/**
 * Raised when a configuration name is registered twice.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DuplicateConfigurationError extends Data.TaggedError("DuplicateConfigurationError")<{
  readonly configuration: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}" is already registered`
  }
}

/**
 * Raised when a page lists a UI form the catalog does not define.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownFormError extends Data.TaggedError("UnknownFormError")<{
  readonly configuration: string
  readonly form: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}" references unknown UI form "${this.form}"`
  }
}

/**
 * Raised when a configuration names a compute module the catalog does not
 * define with the expected role.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownModuleError extends Data.TaggedError("UnknownModuleError")<{
  readonly configuration: string
  readonly module: string
  readonly role: "primary" | "secondary"
}> {
  override get message(): string {
    return `Configuration "${this.configuration}" references unknown ${this.role} module "${this.module}"`
  }
}

/**
 * Raised when the dependency graph contains a cycle. `cycle` lists node ids
 * in edge order, starting at the earliest-declared node; the last node leads
 * back to the first.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CyclicDependencyError extends Data.TaggedError("CyclicDependencyError")<{
  readonly configuration: string
  readonly cycle: ReadonlyArray<string>
}> {
  override get message(): string {
    const first = this.cycle[0]
    const path = first === undefined ? this.cycle : [...this.cycle, first]
    return `Configuration "${this.configuration}": dependency cycle ${path.join(" -> ")}`
  }
}

/**
 * Raised when a consumer needs a variable that nothing can provide.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsatisfiedInputError extends Data.TaggedError("UnsatisfiedInputError")<{
  readonly configuration: string
  readonly variable: string
  readonly consumer: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": "${this.variable}" required by ${this.consumer} has no default, raw value or producer`
  }
}

/**
 * Raised when a primary-module input has no incoming edge at all.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnreachablePrimaryInputError extends Data.TaggedError("UnreachablePrimaryInputError")<{
  readonly configuration: string
  readonly variable: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": primary input "${this.variable}" is not fed by any variable`
  }
}

/**
 * Raised when no callable is registered for an invocation.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnknownCallableError extends Data.TaggedError("UnknownCallableError")<{
  readonly configuration: string
  readonly invocation: InvocationId
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": no implementation registered for ${this.invocation}`
  }
}

/**
 * Raised when an equation or module callable throws.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvocationFailedError extends Data.TaggedError("InvocationFailedError")<{
  readonly configuration: string
  readonly invocation: InvocationId
  readonly problem: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": ${this.invocation} failed: ${this.problem}`
  }
}

/**
 * Raised when a primary input sink ends evaluation without a value. The
 * resolver checks reachability and satisfiability first, so this marks a bug
 * and is delivered as a defect.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MissingPrimaryInputError extends Data.TaggedError("MissingPrimaryInputError")<{
  readonly configuration: string
  readonly variable: string
}> {
  override get message(): string {
    return `Configuration "${this.configuration}": primary input "${this.variable}" has no value after evaluation`
  }
}

/**
 * Errors raised while validating static configuration data.
 *
 * @category Errors
 * @since 0.1.0
 */
export type LoadError =
  | UnknownVariableError
  | ConflictingBindingError
  | DuplicateConfigurationError
  | UnknownFormError
  | UnknownModuleError

/**
 * Errors raised while scheduling a configuration.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ScheduleError = CyclicDependencyError | UnsatisfiedInputError | UnreachablePrimaryInputError

/**
 * Errors raised while walking a schedule.
 *
 * @category Errors
 * @since 0.1.0
 */
export type EvaluationError = UnsatisfiedInputError | UnknownCallableError | InvocationFailedError

/**
 * Union of every error a `resolve` call can fail with.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ResolutionError = UnknownConfigurationError | ScheduleError | EvaluationError
