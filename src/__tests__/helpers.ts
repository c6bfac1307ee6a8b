import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseTaskId } from "../ids.js";
import type { Bucket, Task } from "../types.js";

export const CLASS_DEFS = [
  "    classDef open fill:#e6f4ea,stroke:#34a853,color:#1e4620",
  "    classDef blocked fill:#fce8e6,stroke:#d93025,color:#5f2120",
  "    classDef milestone fill:#e8f0fe,stroke:#1a73e8,color:#174ea6,font-weight:bold",
];

const HEADINGS: Array<[Bucket, string]> = [
  ["blocked", "Blocked"],
  ["todo", "To-Do"],
  ["in-progress", "In Progress"],
  ["done", "Done"],
];

export function text(...lines: string[]): string {
  return lines.join("\n") + "\n";
}

export function mermaid(...body: string[]): string[] {
  return ["```mermaid", "graph TD", ...CLASS_DEFS, ...body, "```"];
}

export function milestoneBlock(
  n: number,
  title: string,
  sections: Partial<Record<Bucket, string[]>>,
  diagram: string[],
): string[] {
  const out = [`## Milestone ${n}: ${title}`, ""];
  for (const [bucket, heading] of HEADINGS) out.push(`### ${heading}`, ...(sections[bucket] ?? []), "");
  out.push(...mermaid(...diagram));
  return out;
}

export function roadmap(aggregate: string[], ...milestones: string[][]): string {
  return text("# Roadmap", "", ...mermaid(...aggregate), ...milestones.flatMap(m => ["", ...m]));
}

// 1WA.1 is done, 1WA.2 waits only on it, 1WA.3 waits on 1WA.2
export const WORKED_LINES = {
  setup: "- [x] 1WA.1 Set up repo",
  parser: "- [ ] 1WA.2 Build parser (depends on 1WA.1)",
  cli: "- [ ] 1WA.3 Wire CLI (depends on 1WA.2)",
};

export function workedDiagram(parserClass: "open" | "blocked"): string[] {
  return [
    '    M1["Milestone 1: Foundation"]:::milestone',
    `    1WA.2["1WA.2 Build parser"]:::${parserClass}`,
    '    1WA.3["1WA.3 Wire CLI"]:::blocked',
    "    1WA.2 --> 1WA.3",
  ];
}

export const WORKED = roadmap(
  workedDiagram("blocked"),
  milestoneBlock(1, "Foundation", {
    blocked: [WORKED_LINES.parser, WORKED_LINES.cli],
    done: [WORKED_LINES.setup],
  }, workedDiagram("blocked")),
);

export const WORKED_AFTER = roadmap(
  workedDiagram("open"),
  milestoneBlock(1, "Foundation", {
    blocked: [WORKED_LINES.cli],
    todo: [WORKED_LINES.parser],
    done: [WORKED_LINES.setup],
  }, workedDiagram("open")),
);

// Two milestones, already a fixed point
export const MULTI_LINES = {
  setup: "- [ ] 1WA.1 Set up repo",
  parser: "- [ ] 1WA.2 Build parser (depends on 1WA.1)",
  cli: "- [ ] 1WA.3 Wire CLI (depends on {1WA.2, 1TI.1})",
  ci: "- [ ] 1TI.1 Add CI",
  publish: "- [ ] 2RL.1 Publish (depends on 1WA.3)",
  changelog: "- [ ] 2RL.2 Write changelog",
};

export const MULTI_M1_NODES = [
  '    M1["Milestone 1: Foundation"]:::milestone',
  '    1WA.1["1WA.1 Set up repo"]:::open',
  '    1WA.2["1WA.2 Build parser"]:::blocked',
  '    1TI.1["1TI.1 Add CI"]:::open',
  '    1WA.3["1WA.3 Wire CLI"]:::blocked',
];

export const MULTI_M2_NODES = [
  '    M2["Milestone 2: Release"]:::milestone',
  '    2RL.1["2RL.1 Publish"]:::blocked',
  '    2RL.2["2RL.2 Write changelog"]:::open',
];

export const MULTI = roadmap(
  [
    ...MULTI_M1_NODES,
    ...MULTI_M2_NODES,
    "    1WA.1 --> 1WA.2",
    "    1WA.2 & 1TI.1 --> 1WA.3",
    "    1WA.3 --> 2RL.1",
  ],
  milestoneBlock(1, "Foundation", {
    blocked: [MULTI_LINES.parser, MULTI_LINES.cli],
    todo: [MULTI_LINES.ci],
    "in-progress": [MULTI_LINES.setup],
  }, [...MULTI_M1_NODES, "    1WA.1 --> 1WA.2", "    1WA.2 & 1TI.1 --> 1WA.3"]),
  milestoneBlock(2, "Release", {
    blocked: [MULTI_LINES.publish],
    todo: [MULTI_LINES.changelog],
  }, MULTI_M2_NODES),
);

export type TaskSpec = {
  deps?: string[];
  bucket?: Bucket;
  done?: boolean;
  description?: string;
};

/** Build a task graph in the given order without going through the parser. */
export function graphOf(specs: Array<[string, TaskSpec?]>): Map<string, Task> {
  const graph = new Map<string, Task>();
  specs.forEach(([id, spec = {}], line) => {
    const parsed = parseTaskId(id);
    if (!parsed) throw new Error(`bad test task ID ${id}`);
    const bucket = spec.bucket ?? (spec.done ? "done" : "todo");
    graph.set(id, {
      id,
      milestone: parsed.milestone,
      category: parsed.category,
      sequence: parsed.sequence,
      subAlpha: parsed.subAlpha,
      description: spec.description ?? `task ${id}`,
      dependencies: spec.deps ?? [],
      explicitlyDone: spec.done ?? false,
      manualBucket: bucket,
      placement: bucket === "in-progress" ? { kind: "pinned", bucket } : { kind: "automatic" },
      line,
    });
  });
  return graph;
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "roadmap-sync-test-"));
}
