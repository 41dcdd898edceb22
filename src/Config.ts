/**
 * Resolver options.
 *
 * @since 0.1.0
 */

import { Config, Context, Layer } from "effect"

/**
 * What to do when a callable's outputs disagree with its declaration.
 *
 * @since 0.1.0
 * @category Models
 */
export type OutputPolicy = "warn" | "ignore"

/**
 * @since 0.1.0
 * @category Models
 */
export interface ResolverOptions {
  /** Outputs returned by a callable but not declared by its invocation. */
  readonly undeclaredOutputs: OutputPolicy
  /** Declared outputs a callable did not return. */
  readonly missingOutputs: OutputPolicy
}

/**
 * @since 0.1.0
 * @category Constructors
 */
export const defaultResolverOptions: ResolverOptions = {
  undeclaredOutputs: "warn",
  missingOutputs: "warn",
}

const policy = (name: string) => Config.literal("warn", "ignore")(name).pipe(Config.withDefault("warn"))

/**
 * Options read from `RESOLVER_UNDECLARED_OUTPUTS` and
 * `RESOLVER_MISSING_OUTPUTS`.
 *
 * @since 0.1.0
 * @category Config
 */
export const resolverOptionsConfig: Config.Config<ResolverOptions> = Config.all({
  undeclaredOutputs: policy("RESOLVER_UNDECLARED_OUTPUTS"),
  missingOutputs: policy("RESOLVER_MISSING_OUTPUTS"),
})

/**
 * @category Services
 * @since 0.1.0
 */
export class ResolverConfig extends Context.Tag("config-binding-resolver/ResolverConfig")<
  ResolverConfig,
  ResolverOptions
>() {
  static layer(options: Partial<ResolverOptions> = {}) {
    return Layer.succeed(this, { ...defaultResolverOptions, ...options })
  }

  static readonly fromEnv = Layer.effect(this, resolverOptionsConfig)
}
