import { Effect, Option } from "effect"
import type { VariableCatalog } from "../../Catalog.js"
import {
  CyclicDependencyError,
  UnreachablePrimaryInputError,
  UnsatisfiedInputError,
  type ScheduleError,
} from "../../Errors.js"
import type { VarValue } from "../../VarValue.js"
import {
  bindingSources,
  bindingTargets,
  edgesInto,
  sinkFeeds,
  variableNodeId,
  type DependencyGraph,
  type InvocationNode,
} from "./DependencyGraph.js"

export interface ExecutionPlan {
  readonly configuration: string
  readonly graph: DependencyGraph
  /** Invocations in evaluation order. */
  readonly order: ReadonlyArray<InvocationNode>
  /** Catalog defaults of the graph's variables, evaluated inputs excluded. */
  readonly defaults: ReadonlyMap<string, VarValue>
  readonly evaluated: ReadonlySet<string>
}

export interface ScheduleOptions {
  readonly catalog: VariableCatalog
  /** Variables that will receive a raw UI value. */
  readonly supplied: ReadonlySet<string>
}

interface Ordering<K> {
  readonly order: ReadonlyArray<K>
  readonly remaining: ReadonlyArray<K>
}

const insertByRank = <K>(queue: Array<K>, item: K, rank: (key: K) => number) => {
  const value = rank(item)
  let low = 0
  let high = queue.length
  while (low < high) {
    const mid = (low + high) >>> 1
    const current = queue[mid]
    if (current !== undefined && rank(current) < value) {
      low = mid + 1
    } else {
      high = mid
    }
  }
  queue.splice(low, 0, item)
}

/**
 * Kahn's algorithm. Among ready nodes the lowest rank goes first.
 */
const kahn = <K>(
  nodes: ReadonlyArray<K>,
  successors: (key: K) => ReadonlyArray<K>,
  rank: (key: K) => number,
): Ordering<K> => {
  const inDegree = new Map<K, number>()
  for (const node of nodes) {
    inDegree.set(node, inDegree.get(node) ?? 0)
    for (const next of successors(node)) {
      inDegree.set(next, (inDegree.get(next) ?? 0) + 1)
    }
  }

  const ready: Array<K> = []
  for (const node of nodes) {
    if ((inDegree.get(node) ?? 0) === 0) {
      insertByRank(ready, node, rank)
    }
  }

  const order: Array<K> = []
  while (ready.length > 0) {
    const node = ready.shift()
    if (node === undefined) {
      break
    }
    order.push(node)
    for (const next of successors(node)) {
      const degree = (inDegree.get(next) ?? 0) - 1
      inDegree.set(next, degree)
      if (degree === 0) {
        insertByRank(ready, next, rank)
      }
    }
  }

  const placed = new Set(order)
  return { order, remaining: nodes.filter((node) => !placed.has(node)) }
}

/**
 * Shortest cycle among `nodes` (given in rank order). Ties go to the cycle
 * through the earliest node, and the path starts at that node.
 */
const shortestCycle = <K>(nodes: ReadonlyArray<K>, successors: (key: K) => ReadonlyArray<K>): ReadonlyArray<K> => {
  const members = new Set(nodes)
  let best: ReadonlyArray<K> = []

  for (const start of nodes) {
    const parent = new Map<K, K>()
    const visited = new Set<K>([start])
    const queue: Array<K> = [start]
    let found: ReadonlyArray<K> | undefined

    while (queue.length > 0 && found === undefined) {
      const node = queue.shift()
      if (node === undefined) {
        break
      }
      for (const next of successors(node)) {
        if (!members.has(next)) {
          continue
        }
        if (next === start) {
          const path: Array<K> = [node]
          let cursor = parent.get(node)
          while (cursor !== undefined) {
            path.push(cursor)
            cursor = parent.get(cursor)
          }
          found = path.reverse()
          break
        }
        if (!visited.has(next)) {
          visited.add(next)
          parent.set(next, node)
          queue.push(next)
        }
      }
    }

    if (found !== undefined && (best.length === 0 || found.length < best.length)) {
      best = found
      if (best.length === 1) {
        break
      }
    }
  }

  return best
}

const memoize = <A>(f: (name: string, self: (name: string) => A) => A): ((name: string) => A) => {
  const cache = new Map<string, A>()
  const self = (name: string): A => {
    const cached = cache.get(name)
    if (cached !== undefined) {
      return cached
    }
    const value = f(name, self)
    cache.set(name, value)
    return value
  }
  return self
}

/**
 * Order the invocations of a graph so that every input is produced before it
 * is consumed, or fail with the first structural problem found.
 */
export const scheduleInvocations = (
  graph: DependencyGraph,
  evaluatedInputs: ReadonlyArray<string>,
  options: ScheduleOptions,
): Effect.Effect<ExecutionPlan, ScheduleError> =>
  Effect.gen(function* () {
    const { configuration } = graph
    const evaluated = new Set(evaluatedInputs)

    // Bindings between variables must be acyclic before producers can be traced through them.
    const variableNames = graph.variables.map((node) => node.name)
    const variableRank = new Map(variableNames.map((name, index) => [name, index] as const))
    const bindTargets = (name: string) => bindingTargets(graph, name)
    const boundOrder = kahn(variableNames, bindTargets, (name) => variableRank.get(name) ?? 0)
    if (boundOrder.remaining.length > 0) {
      const cycle = shortestCycle(boundOrder.remaining, bindTargets)
      return yield* new CyclicDependencyError({ configuration, cycle: cycle.map(variableNodeId) })
    }

    const producers = memoize<ReadonlySet<InvocationNode>>((name, self) => {
      const result = new Set<InvocationNode>()
      for (const edge of edgesInto(graph, variableNodeId(name), "produces")) {
        const node = graph.nodes.get(edge.from)
        if (node?._tag === "EquationInvocation" || node?._tag === "ModuleInvocation") {
          result.add(node)
        }
      }
      for (const source of bindingSources(graph, name)) {
        for (const node of self(source)) {
          result.add(node)
        }
      }
      return result
    })

    const successorSets = new Map<InvocationNode, Set<InvocationNode>>()
    for (const consumer of graph.invocations) {
      for (const input of consumer.info.inputs) {
        for (const producer of producers(input)) {
          const set = successorSets.get(producer) ?? new Set<InvocationNode>()
          set.add(consumer)
          successorSets.set(producer, set)
        }
      }
    }
    const successors = (node: InvocationNode): ReadonlyArray<InvocationNode> =>
      Array.from(successorSets.get(node) ?? []).sort((a, b) => a.ordinal - b.ordinal)

    const scheduled = kahn(graph.invocations, successors, (node) => node.ordinal)
    if (scheduled.remaining.length > 0) {
      const cycle = shortestCycle(scheduled.remaining, successors)
      return yield* new CyclicDependencyError({ configuration, cycle: cycle.map((node) => node.id) })
    }

    for (const sink of graph.sinks) {
      if (edgesInto(graph, sink.id, "feeds").length === 0) {
        return yield* new UnreachablePrimaryInputError({ configuration, variable: sink.name })
      }
    }

    const available = memoize<boolean>((name, self) => {
      if (evaluated.has(name)) {
        return false
      }
      if (options.supplied.has(name) || Option.isSome(options.catalog.defaultOf(name))) {
        return true
      }
      return bindingSources(graph, name).some(self)
    })
    const satisfiable = (name: string) => available(name) || producers(name).size > 0

    for (const node of scheduled.order) {
      for (const input of node.info.inputs) {
        if (!satisfiable(input)) {
          return yield* new UnsatisfiedInputError({ configuration, variable: input, consumer: node.id })
        }
      }
    }

    for (const sink of graph.sinks) {
      const feeds = sinkFeeds(graph, sink)
      const first = feeds[0]
      if (first !== undefined && !feeds.some(satisfiable)) {
        return yield* new UnsatisfiedInputError({ configuration, variable: first, consumer: sink.id })
      }
    }

    const defaults = new Map<string, VarValue>()
    for (const name of variableNames) {
      if (evaluated.has(name)) {
        continue
      }
      const value = options.catalog.defaultOf(name)
      if (Option.isSome(value)) {
        defaults.set(name, value.value)
      }
    }

    yield* Effect.logDebug(`scheduled ${scheduled.order.length} invocation(s)`)
    return { configuration, graph, order: scheduled.order, defaults, evaluated }
  })
