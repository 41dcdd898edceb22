/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./VarValue.js"
export * from "./Model.js"
export * from "./Catalog.js"
export * from "./Bindings.js"
export * from "./BindingStore.js"
export * from "./Loader.js"
export * from "./Compute.js"
export * from "./Config.js"
export * from "./Evaluator.js"
export * from "./Resolver.js"
export * from "./Exporter.js"
export {
  buildDependencyGraph,
  type DependencyGraph,
  type GraphEdge,
  type GraphNode,
  type InvocationNode,
} from "./internal/graph/DependencyGraph.js"
export { scheduleInvocations, type ExecutionPlan } from "./internal/graph/Scheduler.js"
