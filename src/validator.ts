import { CycleError, DuplicateIdError, IntegrityError } from "./errors.js";
import type { IntegrityViolation, RoadmapError } from "./errors.js";
import { findCycle } from "./graph.js";
import { edgePairs, looseTaskRefs, refKind } from "./diagram.js";
import { allSections } from "./parser.js";
import { diagramTarget } from "./synchronizer.js";
import type { ClassificationMap } from "./classifier.js";
import type { DanglingReferenceWarning, DiagramBlock, RenderOptions, RoadmapDocument, TaskId } from "./types.js";

export type CheckStage = "pre" | "post";

// What the rendered document is checked against after reconciliation
export type Expectation = {
  source: RoadmapDocument;
  classification: ClassificationMap;
  options: RenderOptions;
};

export interface CheckContext {
  stage: CheckStage;
  doc: RoadmapDocument;
  expected?: Expectation;
  warn(warning: DanglingReferenceWarning): void;
  fail(name: string, error: RoadmapError): void;
}

export interface Rule {
  name: string;
  stage: CheckStage;
  run(ctx: CheckContext): void;
}

export type CheckResult = {
  warnings: DanglingReferenceWarning[];
  failures: Array<{ name: string; error: RoadmapError }>;
};

export function runChecks(
  rules: Rule[],
  stage: CheckStage,
  doc: RoadmapDocument,
  expected?: Expectation,
): CheckResult {
  const warnings: CheckResult["warnings"] = [];
  const failures: CheckResult["failures"] = [];

  const ctx: CheckContext = {
    stage,
    doc,
    expected,
    warn(w) { warnings.push(w); },
    fail(name, error) { failures.push({ name, error }); },
  };

  for (const r of rules) {
    if (r.stage !== stage) continue;
    r.run(ctx);
  }
  return { warnings, failures };
}

// ---------- pre-check rules ----------

export const uniqueIdsRule: Rule = {
  name: "unique-ids",
  stage: "pre",
  run(ctx) {
    const seen = new Map<TaskId, number[]>();
    for (const { section } of allSections(ctx.doc)) {
      for (const e of section.entries) seen.set(e.taskId, [...(seen.get(e.taskId) ?? []), e.start]);
    }
    for (const [id, lines] of seen) {
      if (lines.length > 1) ctx.fail("unique-ids", new DuplicateIdError(id, lines));
    }
  },
};

export const acyclicRule: Rule = {
  name: "acyclic",
  stage: "pre",
  run(ctx) {
    const cycle = findCycle(ctx.doc.tasks);
    if (!cycle) return;
    const lines = cycle.map(id => ctx.doc.tasks.get(id)?.line ?? -1).filter(l => l >= 0);
    ctx.fail("acyclic", new CycleError(cycle, lines));
  },
};

export const danglingRule: Rule = {
  name: "dangling-references",
  stage: "pre",
  run(ctx) {
    for (const t of ctx.doc.tasks.values()) {
      for (const d of t.dependencies) {
        if (ctx.doc.tasks.has(d)) continue;
        ctx.warn({
          kind: "dangling-reference",
          source: "checklist",
          taskId: t.id,
          reference: d,
          line: t.line,
          message: `${t.id} depends on ${d}, which is not in the roadmap`,
        });
      }
    }
  },
};

// ---------- post-check rules ----------

function integrityRule(name: string, check: (doc: RoadmapDocument, expected: Expectation) => IntegrityViolation[]): Rule {
  return {
    name,
    stage: "post",
    run(ctx) {
      if (!ctx.expected) return;
      const violations = check(ctx.doc, ctx.expected);
      if (violations.length) ctx.fail(name, new IntegrityError(violations));
    },
  };
}

function sameSet<T>(a: Set<T>, b: Set<T>): boolean {
  return a.size === b.size && Array.from(a).every(x => b.has(x));
}

function diagramContent(block: DiagramBlock) {
  const nodes = new Set<string>();
  const classes = new Map<string, string>();
  const edges = new Set<string>();
  const defined = new Set<string>();
  for (const s of block.statements) {
    if (s.kind === "classDef") defined.add(s.name);
    if (s.kind === "node") {
      nodes.add(s.ref.id);
      if (s.ref.className) classes.set(s.ref.id, s.ref.className);
    }
    if (s.kind === "class") {
      for (const id of s.ids) {
        nodes.add(id);
        classes.set(id, s.className);
      }
    }
    if (s.kind === "directive") nodes.add(s.id);
    if (s.kind === "other") for (const id of looseTaskRefs(s.text)) nodes.add(id);
    if (s.kind === "edge") {
      for (const g of s.groups) for (const r of g) {
        nodes.add(r.id);
        if (r.className) classes.set(r.id, r.className);
      }
      for (const [a, b] of edgePairs(s.groups)) {
        if (refKind(a) === "task" && refKind(b) === "task") edges.add(`${a} --> ${b}`);
      }
    }
  }
  return { nodes, classes, edges, defined };
}

export const idsPreservedRule = integrityRule("ids-preserved", (doc, { source }) => {
  const out: IntegrityViolation[] = [];
  const counts = new Map<TaskId, number>();
  for (const { milestone, section } of allSections(doc)) {
    for (const e of section.entries) {
      counts.set(e.taskId, (counts.get(e.taskId) ?? 0) + 1);
      const was = source.tasks.get(e.taskId);
      if (!was) out.push({ rule: "ids-preserved", message: `unexpected task ${e.taskId}`, taskIds: [e.taskId] });
      else if (was.milestone !== milestone.number) {
        out.push({ rule: "ids-preserved", message: `${e.taskId} changed milestone`, taskIds: [e.taskId] });
      }
    }
  }
  for (const id of source.tasks.keys()) {
    const n = counts.get(id) ?? 0;
    if (n !== 1) out.push({ rule: "ids-preserved", message: `${id} appears ${n} times`, taskIds: [id] });
  }
  return out;
});

export const sectionsMatchRule = integrityRule("sections-match-status", (doc, { classification }) => {
  const out: IntegrityViolation[] = [];
  for (const t of doc.tasks.values()) {
    const want = classification.get(t.id)?.status;
    if (want && t.manualBucket !== want) {
      out.push({ rule: "sections-match-status", message: `${t.id} is in ${t.manualBucket}, expected ${want}`, taskIds: [t.id] });
    }
  }
  return out;
});

export const diagramsMatchRule = integrityRule("diagrams-match-checklist", (doc, { source, classification, options }) => {
  const out: IntegrityViolation[] = [];
  const rule = "diagrams-match-checklist";
  for (const block of [doc.aggregate, ...doc.milestones.map(m => m.diagram)]) {
    const where = block.scope === "aggregate" ? "aggregate diagram" : `milestone ${block.scope} diagram`;
    const target = diagramTarget(source, classification, block.scope, options);
    const got = diagramContent(block);

    const wantNodes = new Set(Array.from(target.nodes.keys()).filter(id => refKind(id) === "task"));
    const gotNodes = new Set(Array.from(got.nodes).filter(id => refKind(id) === "task"));
    if (!sameSet(wantNodes, gotNodes)) {
      const diff = [...Array.from(wantNodes).filter(id => !gotNodes.has(id)), ...Array.from(gotNodes).filter(id => !wantNodes.has(id))];
      out.push({ rule, message: `${where} nodes differ from unfinished tasks: ${diff.join(", ")}`, taskIds: diff });
    }

    const wantEdges = new Set(target.edges.map(e => `${e.source} --> ${e.target}`));
    if (!sameSet(wantEdges, got.edges)) {
      const diff = [...Array.from(wantEdges).filter(e => !got.edges.has(e)), ...Array.from(got.edges).filter(e => !wantEdges.has(e))];
      out.push({ rule, message: `${where} edges differ from dependencies: ${diff.join("; ")}` });
    }

    for (const [id, node] of target.nodes) {
      const cls = got.classes.get(id);
      if (cls !== node.className) {
        out.push({ rule, message: `${where}: ${id} has class ${cls ?? "(none)"}, expected ${node.className}`, taskIds: refKind(id) === "task" ? [id] : [] });
      }
    }

    for (const name of Object.values(options.classes)) {
      if (!got.defined.has(name)) out.push({ rule, message: `${where} lacks classDef ${name}` });
    }
  }
  return out;
});

export const DEFAULT_RULES: Rule[] = [
  uniqueIdsRule,
  acyclicRule,
  danglingRule,
  idsPreservedRule,
  sectionsMatchRule,
  diagramsMatchRule,
];
