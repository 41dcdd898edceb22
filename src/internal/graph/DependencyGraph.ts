import type { BindingSet, EquationInfo, SecondaryModuleInfo } from "../../Model.js"
import { invocationId, isVariableBinding, type InvocationId } from "../../Types.js"

export type VariableNodeId = `variable:${string}`
export type SinkNodeId = `primary:${string}`
export type NodeId = VariableNodeId | SinkNodeId | InvocationId

export interface VariableNode {
  readonly _tag: "Variable"
  readonly id: VariableNodeId
  readonly name: string
}

export interface EquationInvocationNode {
  readonly _tag: "EquationInvocation"
  readonly id: InvocationId
  /** Position among all invocations: equations first, then modules. */
  readonly ordinal: number
  readonly info: EquationInfo
}

export interface ModuleInvocationNode {
  readonly _tag: "ModuleInvocation"
  readonly id: InvocationId
  readonly ordinal: number
  readonly info: SecondaryModuleInfo
}

export interface PrimaryInputSinkNode {
  readonly _tag: "PrimaryInputSink"
  readonly id: SinkNodeId
  readonly name: string
}

export type InvocationNode = EquationInvocationNode | ModuleInvocationNode

export type GraphNode = VariableNode | InvocationNode | PrimaryInputSinkNode

/**
 * `consumes`: variable → invocation input. `produces`: invocation → output
 * variable. `binds`: variable → variable taking its value. `feeds`:
 * variable → primary input sink.
 */
export type EdgeKind = "consumes" | "produces" | "binds" | "feeds"

export interface GraphEdge {
  readonly from: NodeId
  readonly to: NodeId
  readonly kind: EdgeKind
}

export interface DependencyGraph {
  readonly configuration: string
  readonly nodes: ReadonlyMap<NodeId, GraphNode>
  /** Variable nodes in first-mention order. */
  readonly variables: ReadonlyArray<VariableNode>
  /** Invocation nodes in declaration order. */
  readonly invocations: ReadonlyArray<InvocationNode>
  /** Sink nodes in declaration order. */
  readonly sinks: ReadonlyArray<PrimaryInputSinkNode>
  readonly outgoing: ReadonlyMap<NodeId, ReadonlyArray<GraphEdge>>
  readonly incoming: ReadonlyMap<NodeId, ReadonlyArray<GraphEdge>>
}

export const variableNodeId = (name: string): VariableNodeId => `variable:${name}`

export const sinkNodeId = (name: string): SinkNodeId => `primary:${name}`

/**
 * Build the structural graph of a binding set. `contract` lists the primary
 * module inputs that must each get a sink even when nothing feeds them.
 */
export const buildDependencyGraph = (
  bindings: BindingSet,
  contract: ReadonlyArray<string> = [],
): DependencyGraph => {
  const nodes = new Map<NodeId, GraphNode>()
  const variables: Array<VariableNode> = []
  const invocations: Array<InvocationNode> = []
  const sinks: Array<PrimaryInputSinkNode> = []
  const outgoing = new Map<NodeId, Array<GraphEdge>>()
  const incoming = new Map<NodeId, Array<GraphEdge>>()
  const edgeKeys = new Set<string>()

  const variable = (name: string): VariableNodeId => {
    const id = variableNodeId(name)
    if (!nodes.has(id)) {
      const node: VariableNode = { _tag: "Variable", id, name }
      nodes.set(id, node)
      variables.push(node)
    }
    return id
  }

  const sink = (name: string): SinkNodeId => {
    const id = sinkNodeId(name)
    if (!nodes.has(id)) {
      const node: PrimaryInputSinkNode = { _tag: "PrimaryInputSink", id, name }
      nodes.set(id, node)
      sinks.push(node)
    }
    return id
  }

  const connect = (from: NodeId, to: NodeId, kind: EdgeKind) => {
    const key = `${from}\u0000${to}\u0000${kind}`
    if (edgeKeys.has(key)) {
      return
    }
    edgeKeys.add(key)
    const edge: GraphEdge = { from, to, kind }
    const out = outgoing.get(from) ?? []
    out.push(edge)
    outgoing.set(from, out)
    const into = incoming.get(to) ?? []
    into.push(edge)
    incoming.set(to, into)
  }

  const wire = (node: InvocationNode) => {
    nodes.set(node.id, node)
    invocations.push(node)
    for (const input of node.info.inputs) {
      connect(variable(input), node.id, "consumes")
    }
    for (const output of node.info.outputs) {
      connect(node.id, variable(output), "produces")
    }
  }

  for (const info of bindings.equations) {
    wire({
      _tag: "EquationInvocation",
      id: invocationId("equation", info.name),
      ordinal: invocations.length,
      info,
    })
  }
  for (const info of bindings.secondaryModules) {
    wire({
      _tag: "ModuleInvocation",
      id: invocationId("module", info.name),
      ordinal: invocations.length,
      info,
    })
  }

  for (const name of bindings.primaryInputs) {
    connect(variable(name), sink(name), "feeds")
  }
  for (const name of bindings.secondaryInputs) {
    variable(name)
  }
  for (const name of bindings.evaluatedInputs) {
    variable(name)
  }

  for (const relation of bindings.relations) {
    if (isVariableBinding(relation.kind)) {
      if (relation.source !== relation.target) {
        connect(variable(relation.source), variable(relation.target), "binds")
      }
      continue
    }
    connect(variable(relation.source), sink(relation.target), "feeds")
  }

  for (const name of contract) {
    sink(name)
  }

  return {
    configuration: bindings.configuration,
    nodes,
    variables,
    invocations,
    sinks,
    outgoing,
    incoming,
  }
}

export const edgesFrom = (graph: DependencyGraph, id: NodeId, kind: EdgeKind): ReadonlyArray<GraphEdge> =>
  (graph.outgoing.get(id) ?? []).filter((edge) => edge.kind === kind)

export const edgesInto = (graph: DependencyGraph, id: NodeId, kind: EdgeKind): ReadonlyArray<GraphEdge> =>
  (graph.incoming.get(id) ?? []).filter((edge) => edge.kind === kind)

/** Names of the variables bound into `name`, in declaration order. */
export const bindingSources = (graph: DependencyGraph, name: string): ReadonlyArray<string> =>
  edgesInto(graph, variableNodeId(name), "binds").map((edge) => edge.from.slice("variable:".length))

/** Names of the variables `name` is bound into, in declaration order. */
export const bindingTargets = (graph: DependencyGraph, name: string): ReadonlyArray<string> =>
  edgesFrom(graph, variableNodeId(name), "binds").map((edge) => edge.to.slice("variable:".length))

/** Names of the variables feeding a sink, in declaration order. */
export const sinkFeeds = (graph: DependencyGraph, sink: PrimaryInputSinkNode): ReadonlyArray<string> =>
  edgesInto(graph, sink.id, "feeds").map((edge) => edge.from.slice("variable:".length))
