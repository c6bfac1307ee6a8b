import { isFenceLine } from "./parser.js";
import { BUCKETS } from "./types.js";
import type { MovePlan } from "./reconciler.js";
import type { DiagramPatch } from "./synchronizer.js";
import type { RoadmapDocument, Section, TaskEntry, TaskId } from "./types.js";

type LineEdits = {
  removed: Set<number>;
  insertBefore: Map<number, string[]>;
  replace: Map<number, { end: number; lines: string[] }>;
};

function withEol(line: string, eol: string): string {
  return line.endsWith("\n") ? line : line + eol;
}

function insertionPoint(doc: RoadmapDocument, section: Section, removed: Set<number>): number {
  const staying = section.entries.filter(e => !removed.has(e.start));
  if (staying.length) return Math.max(...staying.map(e => e.end));
  // After the section's last text line, but above any code block it holds
  let at = section.start + 1;
  for (let i = section.start + 1; i < section.end && !isFenceLine(doc.lines[i]); i++) {
    if (!removed.has(i) && doc.lines[i].trim()) at = i + 1;
  }
  return at;
}

function applyEdits(doc: RoadmapDocument, edits: LineEdits): string {
  const out: string[] = [];
  const push = (line: string) => {
    const last = out.length - 1;
    if (last >= 0 && !out[last].endsWith("\n")) out[last] += doc.eol;
    out.push(line);
  };
  for (let i = 0; i <= doc.lines.length; i++) {
    for (const l of edits.insertBefore.get(i) ?? []) push(l);
    if (i === doc.lines.length) break;
    const r = edits.replace.get(i);
    if (r) {
      for (const l of r.lines) push(l);
      i = r.end - 1;
      continue;
    }
    if (!edits.removed.has(i)) push(doc.lines[i]);
  }
  return out.join("");
}

/**
 * Write the reconciled roadmap back as text. Sections take the order given by
 * the plan's layout; only moved checklist entries and changed diagram
 * interiors differ from the source, and every other line is emitted unchanged.
 */
export function renderRoadmap(doc: RoadmapDocument, plan: MovePlan, patches: DiagramPatch[]): string {
  const edits: LineEdits = { removed: new Set(), insertBefore: new Map(), replace: new Map() };
  const arriving = new Map<Section, TaskEntry[]>();

  for (const milestone of doc.milestones) {
    const layout = plan.layout.get(milestone.number);
    if (!layout) continue;
    const entries = new Map<TaskId, TaskEntry>();
    for (const section of Object.values(milestone.sections)) {
      for (const e of section.entries) if (!entries.has(e.taskId)) entries.set(e.taskId, e);
    }
    for (const b of BUCKETS) {
      const section = milestone.sections[b];
      const wanted = new Set(layout[b]);
      const present = new Set(section.entries.map(e => e.taskId));
      for (const e of section.entries) {
        if (wanted.has(e.taskId)) continue;
        for (let i = e.start; i < e.end; i++) edits.removed.add(i);
      }
      const incoming: TaskEntry[] = [];
      for (const id of layout[b]) {
        const e = entries.get(id);
        if (e && !present.has(id)) incoming.push(e);
      }
      if (incoming.length) arriving.set(section, incoming);
    }
  }

  for (const [section, incoming] of arriving) {
    const at = insertionPoint(doc, section, edits.removed);
    const text: string[] = [];
    for (const e of incoming) {
      for (let i = e.start; i < e.end; i++) text.push(withEol(doc.lines[i], doc.eol));
    }
    edits.insertBefore.set(at, [...(edits.insertBefore.get(at) ?? []), ...text]);
  }

  for (const p of patches) {
    if (!p.changed) continue;
    const { open, close } = p.block;
    if (open + 1 === close) edits.insertBefore.set(close, [...(edits.insertBefore.get(close) ?? []), ...p.lines]);
    else edits.replace.set(open + 1, { end: close, lines: p.lines });
  }

  return applyEdits(doc, edits);
}
