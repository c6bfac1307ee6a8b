export { reconcile, promote, proposedPromotions } from "./pipeline.js";
export type { ReconcileOptions, ReconcileResult, ReconcileSuccess, ReconcileFailure } from "./pipeline.js";
export { parseRoadmap, parseTaskLine } from "./parser.js";
export { classify } from "./classifier.js";
export type { Classification, ClassificationMap, ClassificationReason } from "./classifier.js";
export { planMoves, planSingleMove } from "./reconciler.js";
export type { Move, MovePlan } from "./reconciler.js";
export { diagramTarget, patchDiagram, synchronizeDiagrams } from "./synchronizer.js";
export type { DiagramTarget, DiagramPatch } from "./synchronizer.js";
export { renderRoadmap } from "./renderer.js";
export { runChecks, DEFAULT_RULES } from "./validator.js";
export type { CheckContext, CheckResult, CheckStage, Rule } from "./validator.js";
export { hasCycle, findCycle, danglingReferences, dependencyEdges, topologicalOrder } from "./graph.js";
export { parseTaskId, compareTaskIds, isTaskId } from "./ids.js";
export { loadConfig, normalizeConfig, DEFAULT_CONFIG } from "./config.js";
export type { RoadmapConfig } from "./config.js";
export * from "./errors.js";
export type * from "./types.js";
export { BUCKETS } from "./types.js";
