import type { DependencyEdge, Task, TaskId } from "./types.js";

// Tasks keyed by ID, iterated in document order
export type TaskGraph = ReadonlyMap<TaskId, Task>;

function openTasks(graph: TaskGraph): Task[] {
  return Array.from(graph.values()).filter(t => !t.explicitlyDone);
}

/** Dependency edges between tasks that both exist, in document order. */
export function dependencyEdges(graph: TaskGraph): DependencyEdge[] {
  const edges: DependencyEdge[] = [];
  for (const t of graph.values()) {
    for (const d of t.dependencies) if (graph.has(d)) edges.push({ from: t.id, to: d });
  }
  return edges;
}

export function danglingReferences(graph: TaskGraph): Set<TaskId> {
  const out = new Set<TaskId>();
  for (const t of graph.values()) {
    for (const d of t.dependencies) if (!graph.has(d)) out.add(d);
  }
  return out;
}

/**
 * First dependency cycle among unfinished tasks, as the ordered list of IDs
 * along it (`[a, b]` for a -> b -> a), or null.
 */
export function findCycle(graph: TaskGraph): TaskId[] | null {
  const state = new Map<TaskId, "visiting" | "done">();
  const stack: TaskId[] = [];

  const visit = (id: TaskId): TaskId[] | null => {
    state.set(id, "visiting");
    stack.push(id);
    const task = graph.get(id);
    for (const d of task?.dependencies ?? []) {
      const dep = graph.get(d);
      if (!dep || dep.explicitlyDone) continue;
      const s = state.get(d);
      if (s === "visiting") return stack.slice(stack.indexOf(d));
      if (s === undefined) {
        const found = visit(d);
        if (found) return found;
      }
    }
    stack.pop();
    state.set(id, "done");
    return null;
  };

  for (const t of openTasks(graph)) {
    if (state.has(t.id)) continue;
    const found = visit(t.id);
    if (found) return found;
  }
  return null;
}

export function hasCycle(graph: TaskGraph): boolean {
  return findCycle(graph) !== null;
}

/**
 * Unfinished tasks ordered so every task comes after its unfinished
 * dependencies; independent tasks keep document order. Throws on a cycle.
 */
export function topologicalOrder(graph: TaskGraph): TaskId[] {
  const open = openTasks(graph);
  const position = new Map(open.map((t, i) => [t.id, i] as const));
  const pending = new Map<TaskId, number>();
  const dependents = new Map<TaskId, TaskId[]>();
  for (const t of open) {
    const deps = t.dependencies.filter(d => position.has(d));
    pending.set(t.id, deps.length);
    for (const d of deps) dependents.set(d, [...(dependents.get(d) ?? []), t.id]);
  }

  const ready = open.filter(t => pending.get(t.id) === 0).map(t => t.id);
  const order: TaskId[] = [];
  while (ready.length) {
    ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);
    for (const next of dependents.get(id) ?? []) {
      const left = (pending.get(next) ?? 0) - 1;
      pending.set(next, left);
      if (left === 0) ready.push(next);
    }
  }
  if (order.length !== open.length) {
    throw new Error("dependency graph has a cycle");
  }
  return order;
}
