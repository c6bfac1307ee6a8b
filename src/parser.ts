import { ParseError } from "./errors.js";
import { parseTaskId } from "./ids.js";
import { parseDiagramLines } from "./diagram.js";
import { BUCKETS } from "./types.js";
import type { Bucket, DiagramBlock, DiagramScope, Milestone, RoadmapDocument, Section, Task, TaskEntry } from "./types.js";

const HEADING_RE = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const MILESTONE_RE = /^Milestone\s+([1-9]\d*)\s*(?:[:—–-]\s*(.*))?$/i;
const ANCHOR_RE = /<a\s+(?:id|name)="([^"]+)"\s*>\s*<\/a>/i;
const FENCE_RE = /^\s*(`{3,}|~{3,})\s*([\w-]*)/;
const CHECKBOX_RE = /^(\s*)[-*+]\s+\[([ xX])\]\s+(.*)$/;
const DEPENDS_RE = /\s*(?:[—–-]\s*)?[(\[]?\s*depends\s+on:?\s*\{?([^{}()[\]]*)\}?\s*[)\]]?\s*\.?$/i;

const BUCKET_HEADINGS: Record<string, Bucket> = {
  "blocked": "blocked",
  "to-do": "todo",
  "to do": "todo",
  "todo": "todo",
  "in-progress": "in-progress",
  "in progress": "in-progress",
  "done": "done",
};

export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function isFenceLine(line: string): boolean {
  return FENCE_RE.test(line);
}

export function stripEol(line: string): string {
  return line.replace(/\r?\n$/, "");
}

function dominantEol(lines: string[]): string {
  let crlf = 0;
  let lf = 0;
  for (const l of lines) {
    if (l.endsWith("\r\n")) crlf++;
    else if (l.endsWith("\n")) lf++;
  }
  return crlf > lf ? "\r\n" : "\n";
}

export function bucketFromHeading(text: string): Bucket | null {
  const bare = text.replace(ANCHOR_RE, "").trim().toLowerCase();
  return BUCKET_HEADINGS[bare] ?? null;
}

function indentWidth(s: string): number {
  return (s.match(/^\s*/)?.[0] ?? "").replace(/\t/g, "    ").length;
}

type TaskLine = {
  id: string;
  indent: number;
  done: boolean;
  description: string;
  dependencies: string[];
};

function leadingToken(rest: string): string {
  return (rest.split(/\s+/)[0] ?? "").replace(/:$/, "").replace(/^\*\*|\*\*$/g, "");
}

export function parseTaskLine(text: string, line: number): TaskLine | null {
  const content = stripEol(text);
  const m = content.match(CHECKBOX_RE);
  if (!m) return null;
  const rest = m[3].trim();
  const token = leadingToken(rest);
  const parsed = parseTaskId(token);
  if (!parsed) {
    throw new ParseError(`malformed task ID \`${token}\``, line, text);
  }
  let description = rest.slice(rest.indexOf(token) + token.length).replace(/^\*\*/, "").replace(/^:/, "").trim();
  const dependencies: string[] = [];
  const dep = description.match(DEPENDS_RE);
  if (dep) {
    const refs = dep[1].split(/[\s,]+/).filter(Boolean);
    if (refs.length === 0) {
      throw new ParseError("dependency annotation names no task", line, text, [parsed.id]);
    }
    for (const r of refs) {
      if (!parseTaskId(r)) {
        throw new ParseError(`dependency \`${r}\` is not a task ID`, line, text, [parsed.id]);
      }
      if (!dependencies.includes(r)) dependencies.push(r);
    }
    description = description.slice(0, dep.index).trim();
  }
  return { id: parsed.id, indent: indentWidth(content), done: m[2] !== " ", description, dependencies };
}

type MilestoneDraft = {
  number: number;
  title: string;
  headingLine: number;
  start: number;
  end: number;
  taskIds: string[];
  sections: Partial<Record<Bucket, Section>>;
  diagram?: DiagramBlock;
};

function finishMilestone(draft: MilestoneDraft, lines: string[]): Milestone {
  const heading = lines[draft.headingLine];
  const { blocked, todo, done } = draft.sections;
  const progress = draft.sections["in-progress"];
  if (!blocked || !todo || !progress || !done) {
    const missing = BUCKETS.filter(b => !draft.sections[b]);
    throw new ParseError(`milestone ${draft.number} has no ${missing.join(", ")} section`, draft.headingLine, heading);
  }
  if (!draft.diagram) {
    throw new ParseError(`milestone ${draft.number} has no mermaid diagram block`, draft.headingLine, heading);
  }
  return {
    number: draft.number,
    title: draft.title,
    headingLine: draft.headingLine,
    start: draft.start,
    end: draft.end,
    taskIds: draft.taskIds,
    sections: { blocked, todo, "in-progress": progress, done },
    diagram: draft.diagram,
  };
}

/**
 * Read a roadmap document into its model. Throws ParseError on malformed task
 * lines, missing required structure, or an unterminated fence.
 */
export function parseRoadmap(text: string): RoadmapDocument {
  const lines = splitLines(text);
  const milestones: Milestone[] = [];
  const tasks = new Map<string, Task>();
  let aggregate: DiagramBlock | undefined;

  let milestone: MilestoneDraft | null = null;
  let section: Section | null = null;
  let sectionLevel = 0;
  let entry: (TaskEntry & { indent: number }) | null = null;
  let fence: { marker: string; open: number; mermaid: boolean } | null = null;
  let seenMilestone = false;

  const closeSection = (at: number) => {
    if (section) section.end = at;
    section = null;
    entry = null;
  };
  const closeMilestone = (at: number) => {
    closeSection(at);
    if (milestone) {
      milestone.end = at;
      milestones.push(finishMilestone(milestone, lines));
    }
    milestone = null;
  };

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    const content = stripEol(text);

    if (fence) {
      const close = content.trim();
      if (close.length >= fence.marker.length && close === fence.marker[0].repeat(close.length)) {
        if (fence.mermaid) {
          const scope: DiagramScope | null = milestone ? milestone.number : seenMilestone ? null : "aggregate";
          const block: DiagramBlock | null = scope === null ? null : {
            scope,
            open: fence.open,
            close: i,
            statements: parseDiagramLines(lines.slice(fence.open + 1, i), fence.open + 1),
          };
          if (block && milestone && !milestone.diagram) milestone.diagram = block;
          else if (block && scope === "aggregate" && !aggregate) aggregate = block;
        }
        fence = null;
      }
      continue;
    }

    const f = content.match(FENCE_RE);
    if (f) {
      fence = { marker: f[1], open: i, mermaid: f[2].toLowerCase() === "mermaid" };
      entry = null;
      continue;
    }

    const h = content.match(HEADING_RE);
    if (h) {
      const level = h[1].length;
      if (level <= 2) {
        closeMilestone(i);
        const ms = level === 2 ? h[2].match(MILESTONE_RE) : null;
        if (ms) {
          const number = Number(ms[1]);
          if (milestones.some(m => m.number === number)) {
            throw new ParseError(`milestone ${number} is declared twice`, i, text);
          }
          seenMilestone = true;
          milestone = { number, title: (ms[2] ?? "").trim(), headingLine: i, start: i, end: lines.length, taskIds: [], sections: {} };
        }
        continue;
      }
      // Deeper headings group entries within the open section
      if (section && level > sectionLevel) {
        entry = null;
        continue;
      }
      closeSection(i);
      const bucket = milestone ? bucketFromHeading(h[2]) : null;
      if (milestone && bucket) {
        if (milestone.sections[bucket]) {
          throw new ParseError(`milestone ${milestone.number} declares the ${bucket} section twice`, i, text);
        }
        const inline = h[2].match(ANCHOR_RE);
        const below = i + 1 < lines.length ? stripEol(lines[i + 1]).trim().match(new RegExp(`^${ANCHOR_RE.source}$`, "i")) : null;
        section = { bucket, headingLine: i, anchor: inline?.[1] ?? below?.[1], start: i, end: lines.length, entries: [] };
        milestone.sections[bucket] = section;
        sectionLevel = level;
      }
      continue;
    }

    if (!milestone) continue;
    if (!section) {
      const stray = content.match(CHECKBOX_RE);
      const id = stray ? leadingToken(stray[3].trim()) : "";
      if (parseTaskId(id)) {
        throw new ParseError(`task ${id} is outside the Blocked, To-Do, In Progress and Done sections`, i, text, [id]);
      }
      continue;
    }

    const task = parseTaskLine(text, i);
    if (task) {
      const parsed = parseTaskId(task.id);
      if (parsed && parsed.milestone !== milestone.number) {
        throw new ParseError(`task ${task.id} is filed under milestone ${milestone.number}`, i, text, [task.id]);
      }
      entry = { taskId: task.id, start: i, end: i + 1, indent: task.indent };
      section.entries.push(entry);
      if (!tasks.has(task.id) && parsed) {
        const bucket = section.bucket;
        tasks.set(task.id, {
          id: task.id,
          milestone: parsed.milestone,
          category: parsed.category,
          sequence: parsed.sequence,
          subAlpha: parsed.subAlpha,
          description: task.description,
          dependencies: task.dependencies,
          explicitlyDone: task.done,
          manualBucket: bucket,
          placement: bucket === "in-progress" ? { kind: "pinned", bucket } : { kind: "automatic" },
          line: i,
        });
        milestone.taskIds.push(task.id);
      }
      continue;
    }

    if (entry && content.trim() && indentWidth(content) > entry.indent) {
      entry.end = i + 1;
    } else {
      entry = null;
    }
  }

  if (fence) {
    throw new ParseError("code fence is never closed", fence.open, lines[fence.open]);
  }
  closeMilestone(lines.length);

  if (!aggregate) {
    throw new ParseError("no aggregate mermaid diagram before the first milestone", 0, lines[0] ?? "");
  }

  return { lines, eol: dominantEol(lines), milestones, tasks, aggregate };
}

/** Sections of the document in document order, with their milestone. */
export function allSections(doc: RoadmapDocument): Array<{ milestone: Milestone; section: Section }> {
  const out: Array<{ milestone: Milestone; section: Section }> = [];
  for (const m of doc.milestones) {
    for (const s of Object.values(m.sections)) out.push({ milestone: m, section: s });
  }
  return out.sort((a, b) => a.section.start - b.section.start);
}
