import type { TaskId } from "./types.js";

export type RoadmapErrorKind = "parse" | "cycle" | "duplicate-id" | "integrity" | "promotion";

export abstract class RoadmapError extends Error {
  abstract readonly kind: RoadmapErrorKind;
  // Task IDs the error is about, for callers that highlight them
  readonly taskIds: TaskId[];

  protected constructor(message: string, taskIds: TaskId[] = []) {
    super(message);
    this.name = new.target.name;
    this.taskIds = taskIds;
  }
}

export class ParseError extends RoadmapError {
  readonly kind = "parse";

  constructor(
    readonly reason: string,
    readonly line: number,
    readonly lineText: string,
    taskIds: TaskId[] = [],
  ) {
    super(`line ${line + 1}: ${reason}\n  > ${lineText.replace(/\r?\n$/, "")}`, taskIds);
  }
}

export class CycleError extends RoadmapError {
  readonly kind = "cycle";

  constructor(readonly cycle: TaskId[], readonly lines: number[] = []) {
    const path = [...cycle, cycle[0]].join(" -> ");
    const where = lines.length ? ` (lines ${lines.map(l => l + 1).join(", ")})` : "";
    super(`dependency cycle among unfinished tasks: ${path}${where}`, cycle);
  }
}

export class DuplicateIdError extends RoadmapError {
  readonly kind = "duplicate-id";

  constructor(readonly id: TaskId, readonly lines: number[]) {
    super(`task ID ${id} is used more than once (lines ${lines.map(l => l + 1).join(", ")})`, [id]);
  }
}

export type IntegrityViolation = {
  rule: string;
  message: string;
  taskIds?: TaskId[];
};

export class IntegrityError extends RoadmapError {
  readonly kind = "integrity";

  constructor(readonly violations: IntegrityViolation[]) {
    const ids = Array.from(new Set(violations.flatMap(v => v.taskIds ?? [])));
    const detail = violations.map(v => `  - [${v.rule}] ${v.message}`).join("\n");
    super(`reconciled roadmap failed its own consistency check:\n${detail}`, ids);
  }
}

export class PromotionError extends RoadmapError {
  readonly kind = "promotion";

  constructor(message: string, readonly id: TaskId) {
    super(message, [id]);
  }
}
