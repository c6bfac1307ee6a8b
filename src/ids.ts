import type { TaskId } from "./types.js";

export type ParsedTaskId = {
  id: TaskId;
  milestone: number;
  category: string;
  sequence: number;
  subAlpha?: string;
};

// {milestone}{category}.{sequence}[subAlpha], e.g. 1WA.12 or 2TI.3a
const TASK_ID_RE = /^([1-9]\d*)([A-Za-z]+)\.([1-9]\d*)([a-z])?$/;

export function parseTaskId(raw: string): ParsedTaskId | null {
  const m = raw.match(TASK_ID_RE);
  if (!m) return null;
  return {
    id: raw,
    milestone: Number(m[1]),
    category: m[2],
    sequence: Number(m[3]),
    subAlpha: m[4],
  };
}

export function isTaskId(raw: string): boolean {
  return TASK_ID_RE.test(raw);
}

export function milestoneMarkerId(milestone: number): string {
  return `M${milestone}`;
}

export function isMilestoneMarker(raw: string): boolean {
  return /^M[1-9]\d*$/.test(raw);
}

export function compareTaskIds(a: TaskId, b: TaskId): number {
  const pa = parseTaskId(a);
  const pb = parseTaskId(b);
  if (!pa || !pb) return a.localeCompare(b);
  if (pa.milestone !== pb.milestone) return pa.milestone - pb.milestone;
  if (pa.category !== pb.category) return pa.category < pb.category ? -1 : 1;
  if (pa.sequence !== pb.sequence) return pa.sequence - pb.sequence;
  return (pa.subAlpha ?? "").localeCompare(pb.subAlpha ?? "");
}
