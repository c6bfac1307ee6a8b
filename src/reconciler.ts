import { BUCKETS } from "./types.js";
import type { ClassificationMap } from "./classifier.js";
import type { Bucket, RoadmapDocument, TaskId } from "./types.js";

export type Move = {
  taskId: TaskId;
  milestone: number;
  from: Bucket;
  to: Bucket;
};

export type SectionLayout = Record<Bucket, TaskId[]>;

export type MovePlan = {
  moves: Move[];
  // Tasks that left Blocked in this run
  unblocked: TaskId[];
  // Final order of each milestone's sections
  layout: Map<number, SectionLayout>;
};

/**
 * Decide which checklist entries change section. Entries that stay keep their
 * relative order; arrivals go to the bottom of their new section in document
 * order.
 */
export function planMoves(doc: RoadmapDocument, classification: ClassificationMap): MovePlan {
  return planTowards(doc, id => classification.get(id)?.status);
}

/** A plan that moves one entry and leaves every other entry where it is. */
export function planSingleMove(doc: RoadmapDocument, taskId: TaskId, to: Bucket): MovePlan {
  return planTowards(doc, id => (id === taskId ? to : undefined));
}

function planTowards(doc: RoadmapDocument, destination: (id: TaskId) => Bucket | undefined): MovePlan {
  const moves: Move[] = [];
  const unblocked: TaskId[] = [];
  const layout = new Map<number, SectionLayout>();

  for (const m of doc.milestones) {
    const sections: SectionLayout = { "blocked": [], "todo": [], "in-progress": [], "done": [] };
    const arrivals: SectionLayout = { "blocked": [], "todo": [], "in-progress": [], "done": [] };

    for (const s of Object.values(m.sections)) {
      for (const e of s.entries) {
        const target = destination(e.taskId) ?? s.bucket;
        if (target === s.bucket) sections[s.bucket].push(e.taskId);
      }
    }

    for (const id of m.taskIds) {
      const task = doc.tasks.get(id);
      const to = destination(id);
      if (!task || !to || to === task.manualBucket) continue;
      moves.push({ taskId: id, milestone: m.number, from: task.manualBucket, to });
      arrivals[to].push(id);
      if (task.manualBucket === "blocked" && (to === "todo" || to === "in-progress")) unblocked.push(id);
    }

    for (const b of BUCKETS) sections[b].push(...arrivals[b]);
    layout.set(m.number, sections);
  }

  return { moves, unblocked, layout };
}
