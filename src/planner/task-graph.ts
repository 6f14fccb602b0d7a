import { ConstructionError } from "../errors.js";
import type { GraphNode, Subtask } from "./types.js";

/**
 * Validate a dependency graph: unique ids, known deps, no self edges, no
 * cycles. Throws ConstructionError on the first violation. An empty graph is
 * valid.
 */
export function validate(nodes: readonly GraphNode[]): void {
  const ids = new Set<string>();
  for (const node of nodes) {
    if (ids.has(node.id)) {
      throw new ConstructionError("DUPLICATE_ID", `Duplicate node id "${node.id}"`);
    }
    ids.add(node.id);
  }

  for (const node of nodes) {
    if (node.dependencies.includes(node.id)) {
      throw new ConstructionError("SELF_DEPENDENCY", `Node "${node.id}" depends on itself`, [node.id]);
    }
    for (const dep of node.dependencies) {
      if (!ids.has(dep)) {
        throw new ConstructionError("UNKNOWN_DEPENDENCY", `Node "${node.id}" depends on unknown node "${dep}"`);
      }
    }
  }

  const cycle = findCycle(nodes);
  if (cycle) {
    throw new ConstructionError("CYCLE_DETECTED", `Task graph contains a cycle: ${cycle.join(" -> ")}`, cycle);
  }
}

/** Build adjacency: node → its dependents (nodes that depend on it). */
export function dependentsMap(nodes: readonly GraphNode[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    for (const dep of node.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(node.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/** Detect a cycle using DFS with coloring. Returns the cycle path, closed on its first node. */
export function findCycle(nodes: readonly GraphNode[]): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const node of nodes) color.set(node.id, WHITE);

  const dependents = dependentsMap(nodes);
  const path: string[] = [];

  function dfs(id: string): string[] | null {
    color.set(id, GRAY);
    path.push(id);
    for (const next of dependents.get(id) ?? []) {
      const c = color.get(next);
      if (c === GRAY) {
        // back edge = cycle
        return [...path.slice(path.indexOf(next)), next];
      }
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    path.pop();
    color.set(id, BLACK);
    return null;
  }

  for (const node of nodes) {
    if (color.get(node.id) === WHITE) {
      const found = dfs(node.id);
      if (found) return found;
    }
  }
  return null;
}

/** Return nodes in topological order (dependencies first), stable with respect to input order. */
export function topologicalSort<T extends GraphNode>(nodes: readonly T[]): T[] {
  const nodeMap = new Map(nodes.map((n) => [n.id, n]));
  const visited = new Set<string>();
  const sorted: T[] = [];

  function visit(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);
    const node = nodeMap.get(id);
    if (!node) return;
    for (const dep of node.dependencies) {
      visit(dep);
    }
    sorted.push(node);
  }

  for (const node of nodes) {
    visit(node.id);
  }

  return sorted;
}

/**
 * Layer the graph into batches: every node of layer k depends only on nodes
 * of earlier layers. Within a layer, input order is kept.
 */
export function executionLayers(nodes: readonly GraphNode[]): string[][] {
  const known = new Set(nodes.map((n) => n.id));
  const remaining = new Map(nodes.map((n) => [n.id, n]));
  const placed = new Set<string>();
  const layers: string[][] = [];

  while (remaining.size > 0) {
    const layer = [...remaining.values()]
      .filter((n) => n.dependencies.every((d) => placed.has(d) || !known.has(d)))
      .map((n) => n.id);
    if (layer.length === 0) break;
    for (const id of layer) {
      remaining.delete(id);
      placed.add(id);
    }
    layers.push(layer);
  }

  return layers;
}

/** Deterministic dispatch order: priority descending, then insertion order. */
export function byDispatchOrder(a: Subtask, b: Subtask): number {
  return b.priority - a.priority || a.seq - b.seq;
}

/** Pending subtasks whose dependencies have all completed. */
export function promotable(subtasks: readonly Subtask[]): Subtask[] {
  const completed = new Set(subtasks.filter((t) => t.status === "completed").map((t) => t.id));
  return subtasks.filter(
    (t) => t.status === "pending" && t.dependencies.every((d) => completed.has(d)),
  );
}

/** Ready subtasks in dispatch order. */
export function readySet(subtasks: readonly Subtask[]): Subtask[] {
  return subtasks.filter((t) => t.status === "ready").sort(byDispatchOrder);
}

export function isTerminal(status: Subtask["status"]): boolean {
  return status === "completed" || status === "aborted";
}

/** True when every subtask is terminal. `failed` still has a reflexion decision pending. */
export function isSettled(subtasks: readonly Subtask[]): boolean {
  return subtasks.every((t) => isTerminal(t.status));
}

/** All transitive dependents of a node, in breadth-first order. */
export function downstreamOf(nodes: readonly GraphNode[], id: string): string[] {
  const dependents = dependentsMap(nodes);
  const queue = [...(dependents.get(id) ?? [])];
  const seen = new Set<string>();
  const order: string[] = [];

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    order.push(next);
    queue.push(...(dependents.get(next) ?? []));
  }
  return order;
}
