import { topologicalOrder } from "./graph.js";
import type { TaskGraph } from "./graph.js";
import type { Bucket, TaskId } from "./types.js";

export type ClassificationReason =
  | "done"      // checkbox ticked
  | "blocked"   // at least one unfinished dependency
  | "dangling"  // kept in Blocked: only missing dependencies remain
  | "pinned"    // manually placed In Progress, now unblocked
  | "ready";    // all dependencies done

export type Classification = {
  id: TaskId;
  status: Bucket;
  reason: ClassificationReason;
  // Dependencies that exist and are not done
  waitingOn: TaskId[];
  // Dependencies that name no task in the document
  dangling: TaskId[];
};

export type ClassificationMap = Map<TaskId, Classification>;

/**
 * Compute the status of every task. Expects an acyclic graph over unfinished
 * tasks; the result is keyed in document order.
 */
export function classify(graph: TaskGraph): ClassificationMap {
  const computed = new Map<TaskId, Classification>();

  for (const task of graph.values()) {
    if (task.explicitlyDone) {
      computed.set(task.id, { id: task.id, status: "done", reason: "done", waitingOn: [], dangling: [] });
    }
  }

  for (const id of topologicalOrder(graph)) {
    const task = graph.get(id);
    if (!task) continue;
    const waitingOn: TaskId[] = [];
    const dangling: TaskId[] = [];
    for (const d of task.dependencies) {
      if (!graph.has(d)) dangling.push(d);
      else if (computed.get(d)?.status !== "done") waitingOn.push(d);
    }

    let status: Bucket;
    let reason: ClassificationReason;
    if (waitingOn.length) {
      status = "blocked";
      reason = "blocked";
    } else if (dangling.length && task.manualBucket === "blocked") {
      status = "blocked";
      reason = "dangling";
    } else if (task.placement.kind === "pinned") {
      status = task.placement.bucket;
      reason = "pinned";
    } else {
      status = "todo";
      reason = "ready";
    }
    computed.set(id, { id, status, reason, waitingOn, dangling });
  }

  const ordered: ClassificationMap = new Map();
  for (const id of graph.keys()) {
    const c = computed.get(id);
    if (c) ordered.set(id, c);
  }
  return ordered;
}
