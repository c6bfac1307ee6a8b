import { classify } from "./classifier.js";
import type { Classification, ClassificationMap } from "./classifier.js";
import { IntegrityError, PromotionError, RoadmapError } from "./errors.js";
import { parseRoadmap } from "./parser.js";
import { planMoves, planSingleMove } from "./reconciler.js";
import type { Move } from "./reconciler.js";
import { renderRoadmap } from "./renderer.js";
import { synchronizeDiagrams } from "./synchronizer.js";
import { DEFAULT_RULES, runChecks } from "./validator.js";
import type { CheckResult, Rule } from "./validator.js";
import { DEFAULT_RENDER_OPTIONS } from "./config.js";
import type { DanglingReferenceWarning, RenderOptions, RoadmapDocument, TaskId } from "./types.js";

export type ReconcileOptions = Partial<RenderOptions> & {
  rules?: Rule[];
};

export type ReconcileSuccess = {
  ok: true;
  text: string;
  changed: boolean;
  moves: Move[];
  unblocked: TaskId[];
  warnings: DanglingReferenceWarning[];
  classification: ClassificationMap;
  promotions: TaskId[];
};

export type ReconcileFailure = {
  ok: false;
  error: RoadmapError;
  warnings: DanglingReferenceWarning[];
};

export type ReconcileResult = ReconcileSuccess | ReconcileFailure;

function renderOptions(options: ReconcileOptions): RenderOptions {
  return {
    classes: options.classes ?? DEFAULT_RENDER_OPTIONS.classes,
    classDefs: options.classDefs ?? DEFAULT_RENDER_OPTIONS.classDefs,
    indent: options.indent ?? DEFAULT_RENDER_OPTIONS.indent,
  };
}

function firstError(failures: CheckResult["failures"]): RoadmapError {
  if (failures.every(f => f.error instanceof IntegrityError)) {
    return new IntegrityError(failures.flatMap(f => (f.error instanceof IntegrityError ? f.error.violations : [])));
  }
  return failures[0].error;
}

function parse(text: string): RoadmapDocument | RoadmapError {
  try {
    return parseRoadmap(text);
  } catch (e) {
    if (e instanceof RoadmapError) return e;
    throw e;
  }
}

type Prepared = {
  doc: RoadmapDocument;
  classification: ClassificationMap;
  warnings: DanglingReferenceWarning[];
};

function prepare(text: string, rules: Rule[]): Prepared | ReconcileFailure {
  const doc = parse(text);
  if (doc instanceof RoadmapError) return { ok: false, error: doc, warnings: [] };
  const pre = runChecks(rules, "pre", doc);
  if (pre.failures.length) return { ok: false, error: firstError(pre.failures), warnings: pre.warnings };
  return { doc, classification: classify(doc.tasks), warnings: pre.warnings };
}

/** Ready To-Do tasks a human may choose to start, in document order. */
function readyTasks(classification: ClassificationMap): TaskId[] {
  const out: TaskId[] = [];
  for (const c of classification.values()) if (c.status === "todo") out.push(c.id);
  return out;
}

/**
 * Recompute every task's status, move checklist entries to their sections and
 * bring every diagram in line with the checklist. Nothing is returned for
 * writing unless the result passes its own consistency checks.
 */
export function reconcile(text: string, options: ReconcileOptions = {}): ReconcileResult {
  const rules = options.rules ?? DEFAULT_RULES;
  const opts = renderOptions(options);
  const prepared = prepare(text, rules);
  if ("ok" in prepared) return prepared;
  const { doc, classification } = prepared;

  const plan = planMoves(doc, classification);
  const sync = synchronizeDiagrams(doc, classification, opts);
  const warnings = [...prepared.warnings, ...sync.warnings];
  const out = renderRoadmap(doc, plan, sync.patches);

  const rendered = parse(out);
  if (rendered instanceof RoadmapError) {
    const error = new IntegrityError([{ rule: "reparse", message: rendered.message, taskIds: rendered.taskIds }]);
    return { ok: false, error, warnings };
  }
  const post = runChecks(rules, "post", rendered, { source: doc, classification, options: opts });
  if (post.failures.length) return { ok: false, error: firstError(post.failures), warnings };

  return {
    ok: true,
    text: out,
    changed: out !== text,
    moves: plan.moves,
    unblocked: plan.unblocked,
    warnings,
    classification,
    promotions: readyTasks(classification),
  };
}

export function proposedPromotions(result: ReconcileResult): TaskId[] {
  return result.ok ? [...result.promotions] : [];
}

/**
 * Move a ready task into In Progress, then reconcile. This is the explicit
 * confirmation step; reconcile() alone never promotes anything.
 */
export function promote(text: string, id: TaskId, options: ReconcileOptions = {}): ReconcileResult {
  const prepared = prepare(text, options.rules ?? DEFAULT_RULES);
  if ("ok" in prepared) return prepared;
  const { doc, classification } = prepared;

  const task = doc.tasks.get(id);
  const c: Classification | undefined = classification.get(id);
  if (!task || !c) {
    return { ok: false, error: new PromotionError(`no task ${id} in the roadmap`, id), warnings: prepared.warnings };
  }
  if (c.status !== "todo") {
    const why = c.waitingOn.length ? ` (waiting on ${c.waitingOn.join(", ")})` : "";
    const error = new PromotionError(`${id} is ${c.status}${why}; only ready To-Do tasks can be started`, id);
    return { ok: false, error, warnings: prepared.warnings };
  }

  const move: Move = { taskId: id, milestone: task.milestone, from: task.manualBucket, to: "in-progress" };
  const moved = renderRoadmap(doc, planSingleMove(doc, id, "in-progress"), []);
  const result = reconcile(moved, options);
  if (!result.ok) return result;
  return { ...result, changed: result.text !== text, moves: [move, ...result.moves] };
}
