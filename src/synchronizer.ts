import { edgeLine, edgeLinks, nodeLine, refKind, renderEdge, renderRef } from "./diagram.js";
import { milestoneMarkerId } from "./ids.js";
import { CLASS_KEYS } from "./types.js";
import type { ClassificationMap } from "./classifier.js";
import type {
  DanglingReferenceWarning, DiagramBlock, DiagramScope, DiagramStatement, NodeRef,
  RenderOptions, RoadmapDocument, TaskId,
} from "./types.js";

export type TargetNode = { label: string; className: string };

export type DiagramTarget = {
  scope: DiagramScope;
  nodes: Map<string, TargetNode>;
  // Drawn as `source --> target`: target depends on source
  edges: Array<{ source: TaskId; target: TaskId }>;
};

export type DiagramPatch = {
  block: DiagramBlock;
  target: DiagramTarget;
  // Interior lines of the block, with terminators
  lines: string[];
  changed: boolean;
};

export type SyncResult = {
  patches: DiagramPatch[];
  warnings: DanglingReferenceWarning[];
};

const edgeKey = (source: string, target: string) => `${source}\u0000${target}`;

/** What a diagram must show, computed from the classification alone. */
export function diagramTarget(
  doc: RoadmapDocument,
  classification: ClassificationMap,
  scope: DiagramScope,
  options: RenderOptions,
): DiagramTarget {
  const { classes } = options;
  const milestones = scope === "aggregate" ? doc.milestones : doc.milestones.filter(m => m.number === scope);
  const nodes = new Map<string, TargetNode>();

  for (const m of milestones) {
    const title = m.title ? `Milestone ${m.number}: ${m.title}` : `Milestone ${m.number}`;
    nodes.set(milestoneMarkerId(m.number), { label: title, className: classes.milestone });
  }
  const taskIds = milestones.flatMap(m => m.taskIds);
  for (const id of taskIds) {
    const status = classification.get(id)?.status;
    const task = doc.tasks.get(id);
    if (!task || !status || status === "done") continue;
    const label = `${id} ${task.description}`.trim();
    nodes.set(id, { label, className: status === "blocked" ? classes.blocked : classes.open });
  }

  const edges: DiagramTarget["edges"] = [];
  for (const id of taskIds) {
    if (!nodes.has(id)) continue;
    for (const d of doc.tasks.get(id)?.dependencies ?? []) {
      if (nodes.has(d) && refKind(d) === "task") edges.push({ source: d, target: id });
    }
  }
  return { scope, nodes, edges };
}

function detectIndent(statements: DiagramStatement[], fallback: string): string {
  for (const s of statements) {
    if (s.kind === "node" || s.kind === "edge" || s.kind === "class") return s.indent;
    if (s.kind === "classDef") return s.text.match(/^\s*/)?.[0] ?? fallback;
  }
  return fallback;
}

function eolOf(text: string, fallback: string): string {
  return text.match(/\r?\n$/)?.[0] ?? fallback;
}

type OutLine = { kind: DiagramStatement["kind"] | "generated-node" | "generated-edge"; text: string };

/**
 * Patch one mermaid block toward its target. Lines that already agree with the
 * target are kept byte-for-byte; stale references are stripped from the lines
 * that hold them; missing declarations and edges are added.
 */
export function patchDiagram(
  doc: RoadmapDocument,
  block: DiagramBlock,
  target: DiagramTarget,
  options: RenderOptions,
): { patch: DiagramPatch; warnings: DanglingReferenceWarning[] } {
  const eol = doc.eol;
  const indent = detectIndent(block.statements, options.indent);
  const wantedEdges = new Set(target.edges.map(e => edgeKey(e.source, e.target)));
  const emittedEdges = new Set<string>();
  const declared = new Set<string>();
  const warnings: DanglingReferenceWarning[] = [];
  const warned = new Set<string>();
  const out: OutLine[] = [];

  const keepRef = (ref: NodeRef, line: number): boolean => {
    const kind = refKind(ref.id);
    if (kind === "foreign" || target.nodes.has(ref.id)) return true;
    if (kind === "task" && !doc.tasks.has(ref.id) && !warned.has(ref.id)) {
      warned.add(ref.id);
      warnings.push({
        kind: "dangling-reference",
        source: "diagram",
        reference: ref.id,
        line,
        message: `diagram references unknown task ${ref.id}; reference dropped`,
      });
    }
    return false;
  };
  const restyle = (ref: NodeRef): NodeRef => {
    const want = target.nodes.get(ref.id)?.className;
    return ref.className && want && ref.className !== want ? { ...ref, className: want } : ref;
  };

  if (!block.statements.some(s => s.kind === "header")) out.push({ kind: "header", text: `graph TD${eol}` });

  block.statements.forEach((s, i) => {
    const line = block.open + 1 + i;
    switch (s.kind) {
      case "node": {
        if (!keepRef(s.ref, line) || declared.has(s.ref.id)) return;
        declared.add(s.ref.id);
        const want = target.nodes.get(s.ref.id)?.className;
        if (s.ref.className === want) out.push({ kind: "node", text: s.text });
        else out.push({ kind: "node", text: `${s.indent}${renderRef({ ...s.ref, className: want })}${eolOf(s.text, eol)}` });
        return;
      }
      case "class": {
        const ids = s.ids.filter(id => {
          const node = target.nodes.get(id);
          if (!node) return keepRef({ id, shape: "" }, line);
          return node.className === s.className;
        });
        if (!ids.length) return;
        if (ids.length === s.ids.length) out.push({ kind: "class", text: s.text });
        else out.push({ kind: "class", text: `${s.indent}class ${ids.join(",")} ${s.className}${eolOf(s.text, eol)}` });
        return;
      }
      case "edge": {
        const groups = s.groups.map(g => g.filter(ref => keepRef(ref, line)).map(restyle));
        if (groups.some(g => g.length === 0)) return;
        const links = edgeLinks(groups, s.arrows);
        const seen = new Set<string>();
        const clean = links.every(({ source: a, target: b }) => {
          if (refKind(a) !== "task" || refKind(b) !== "task") return true;
          const key = edgeKey(a, b);
          if (!wantedEdges.has(key) || emittedEdges.has(key) || seen.has(key)) return false;
          seen.add(key);
          return true;
        });
        if (clean) {
          seen.forEach(k => emittedEdges.add(k));
          const text = renderEdge(s.indent, groups, s.arrows);
          const original = renderEdge(s.indent, s.groups, s.arrows);
          out.push({ kind: "edge", text: text === original ? s.text : `${text}${eolOf(s.text, eol)}` });
          return;
        }
        // Not every pair on the line is wanted: re-emit only the ones that are
        const salvage = new Map<string, { target: string; arrow: string; sources: string[] }>();
        for (const { source: a, target: b, arrow } of links) {
          if (refKind(a) === "task" && refKind(b) === "task") {
            const key = edgeKey(a, b);
            if (!wantedEdges.has(key) || emittedEdges.has(key)) continue;
            emittedEdges.add(key);
          }
          const group = salvage.get(edgeKey(b, arrow)) ?? { target: b, arrow, sources: [] };
          if (!group.sources.includes(a)) group.sources.push(a);
          salvage.set(edgeKey(b, arrow), group);
        }
        for (const g of salvage.values()) {
          out.push({ kind: "edge", text: `${edgeLine(s.indent, g.sources, g.target, g.arrow)}${eolOf(s.text, eol)}` });
        }
        return;
      }
      case "directive":
        // style and click both make mermaid draw the node they name
        if (keepRef({ id: s.id, shape: "" }, line)) out.push({ kind: s.kind, text: s.text });
        return;
      default:
        out.push({ kind: s.kind, text: s.text });
    }
  });

  // Class definitions the diagram relies on are always present
  const defined = new Set(block.statements.flatMap(s => (s.kind === "classDef" ? [s.name] : [])));
  const missingDefs = CLASS_KEYS
    .filter(k => !defined.has(options.classes[k]))
    .map(k => ({ kind: "classDef" as const, text: `${indent}classDef ${options.classes[k]} ${options.classDefs[k]}${eol}` }));
  if (missingDefs.length) {
    const at = lastIndex(out, l => l.kind === "classDef", lastIndex(out, l => l.kind === "header", -1));
    out.splice(at + 1, 0, ...missingDefs);
  }

  const newNodes: OutLine[] = [];
  for (const [id, node] of target.nodes) {
    if (declared.has(id)) continue;
    newNodes.push({ kind: "generated-node", text: `${nodeLine(indent, id, node.label, node.className)}${eol}` });
  }
  if (newNodes.length) {
    const fallback = lastIndex(out, l => l.kind === "classDef", lastIndex(out, l => l.kind === "header", -1));
    const at = lastIndex(out, l => l.kind === "node", fallback);
    out.splice(at + 1, 0, ...newNodes);
  }

  const missingEdges = new Map<string, string[]>();
  for (const e of target.edges) {
    if (emittedEdges.has(edgeKey(e.source, e.target))) continue;
    missingEdges.set(e.target, [...(missingEdges.get(e.target) ?? []), e.source]);
  }
  if (missingEdges.size) {
    const lines = Array.from(missingEdges, ([t, sources]) => ({ kind: "generated-edge" as const, text: `${edgeLine(indent, sources, t)}${eol}` }));
    const fallback = lastIndex(out, l => l.kind === "node" || l.kind === "generated-node", lastIndex(out, l => l.kind === "classDef" || l.kind === "header", -1));
    const at = lastIndex(out, l => l.kind === "edge" || l.kind === "generated-edge", fallback);
    out.splice(at + 1, 0, ...lines);
  }

  const original = doc.lines.slice(block.open + 1, block.close);
  const lines = out.map(l => l.text);
  const changed = lines.length !== original.length || lines.some((l, i) => l !== original[i]);
  return { patch: { block, target, lines, changed }, warnings };
}

function lastIndex<T>(arr: T[], pred: (x: T) => boolean, fallback: number): number {
  for (let i = arr.length - 1; i >= 0; i--) if (pred(arr[i])) return i;
  return fallback;
}

/** Patch the aggregate diagram and every milestone diagram. */
export function synchronizeDiagrams(
  doc: RoadmapDocument,
  classification: ClassificationMap,
  options: RenderOptions,
): SyncResult {
  const blocks = [doc.aggregate, ...doc.milestones.map(m => m.diagram)];
  const patches: DiagramPatch[] = [];
  const warnings: DanglingReferenceWarning[] = [];
  for (const block of blocks) {
    const target = diagramTarget(doc, classification, block.scope, options);
    const r = patchDiagram(doc, block, target, options);
    patches.push(r.patch);
    warnings.push(...r.warnings);
  }
  return { patches, warnings };
}
