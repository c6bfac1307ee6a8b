import { ParseError } from "./errors.js";
import { isMilestoneMarker, isTaskId } from "./ids.js";
import type { Arrow, DiagramStatement, NodeRef } from "./types.js";

const HEADER_RE = /^(graph|flowchart)(\s+(TB|TD|BT|RL|LR))?\s*;?$/;
const CLASSDEF_RE = /^classDef\s+([\w-]+)\s+(.+)$/;
const CLASS_RE = /^class\s+([\w.,\s]+?)\s+([\w-]+)\s*;?$/;
const DIRECTIVE_RE = /^(style|click)\s+([\w.]+)(?:\s|$)/;
const REF_RE = /^([\w.]+)([\[({>].*[\])}])?(?::::([\w-]+))?$/;

// A link of any length, with an optional `-- text -->` or `-->|text|` label
const LINK_HEAD = String.raw`(?:<|(?<=\s)[ox])?`;
const LINK_TAIL = String.raw`(?:>+|[ox](?=\s))?`;
const PLAIN_LINK = String.raw`${LINK_HEAD}(?:-{2,}|={2,}|~{3,}|-\.+-)${LINK_TAIL}`;
const TEXT_LINK = String.raw`${LINK_HEAD}(?:--|==|-\.)\s+[^\s|][^|]*?\s+(?:-{2,}|={2,}|\.+-)${LINK_TAIL}`;
const LINK_SPLIT_RE = new RegExp(String.raw`\s*((?:${TEXT_LINK}|${PLAIN_LINK})(?:\|[^|]*\|)?)\s*`);

export type RefKind = "task" | "marker" | "foreign";

export function refKind(id: string): RefKind {
  if (isTaskId(id)) return "task";
  if (isMilestoneMarker(id)) return "marker";
  return "foreign";
}

function splitIndent(s: string): [string, string] {
  const m = s.match(/^(\s*)(.*?)\s*$/);
  return m ? [m[1], m[2]] : ["", s];
}

export function parseRef(raw: string): NodeRef | null {
  const m = raw.trim().match(REF_RE);
  if (!m) return null;
  return { id: m[1], shape: m[2] ?? "", className: m[3] };
}

function parseEdge(body: string): { groups: NodeRef[][]; arrows: Arrow[] } | null {
  const parts = body.split(LINK_SPLIT_RE);
  // split() with a capture group interleaves operands and arrows
  if (parts.length < 3 || parts.length % 2 === 0) return null;
  const groups: NodeRef[][] = [];
  const arrows: Arrow[] = [];
  for (let i = 0; i < parts.length; i++) {
    if (i % 2 === 1) {
      arrows.push(parts[i]);
      continue;
    }
    const refs: NodeRef[] = [];
    for (const piece of parts[i].split("&")) {
      const ref = parseRef(piece);
      if (!ref) return null;
      refs.push(ref);
    }
    groups.push(refs);
  }
  return { groups, arrows };
}

/**
 * Parse the interior lines of a mermaid block into statements.
 * `texts` are the raw lines including terminators; `firstLine` is the index of
 * the first interior line in the document, for error reporting.
 */
export function parseDiagramLines(texts: string[], firstLine: number): DiagramStatement[] {
  const out: DiagramStatement[] = [];
  let seenHeader = false;
  texts.forEach((text, i) => {
    const [indent, body0] = splitIndent(text.replace(/\r?\n$/, ""));
    const body = body0.replace(/;$/, "").trimEnd();
    if (!body) { out.push({ kind: "blank", text }); return; }
    if (body.startsWith("%%")) { out.push({ kind: "other", text }); return; }
    if (!seenHeader) {
      if (!HEADER_RE.test(body)) {
        throw new ParseError("diagram block must start with a `graph` or `flowchart` header", firstLine + i, text);
      }
      seenHeader = true;
      out.push({ kind: "header", text });
      return;
    }
    const cd = body.match(CLASSDEF_RE);
    if (cd) { out.push({ kind: "classDef", name: cd[1], text }); return; }
    const cl = body.match(CLASS_RE);
    if (cl) {
      const ids = cl[1].split(",").map(s => s.trim()).filter(Boolean);
      out.push({ kind: "class", indent, ids, className: cl[2], text });
      return;
    }
    const directive = body.match(DIRECTIVE_RE);
    if (directive) {
      out.push({ kind: "directive", keyword: directive[1] === "click" ? "click" : "style", id: directive[2], text });
      return;
    }
    const edge = parseEdge(body);
    if (edge) { out.push({ kind: "edge", indent, ...edge, text }); return; }
    const ref = parseRef(body);
    if (ref && refKind(ref.id) !== "foreign") { out.push({ kind: "node", indent, ref, text }); return; }
    out.push({ kind: "other", text });
  });
  return out;
}

export function renderRef(ref: NodeRef): string {
  return `${ref.id}${ref.shape}${ref.className ? `:::${ref.className}` : ""}`;
}

export function renderEdge(indent: string, groups: NodeRef[][], arrows: Arrow[]): string {
  let s = groups[0].map(renderRef).join(" & ");
  for (let i = 1; i < groups.length; i++) {
    s += ` ${arrows[i - 1]} ${groups[i].map(renderRef).join(" & ")}`;
  }
  return indent + s;
}

export function escapeLabel(text: string): string {
  return text.replace(/"/g, "#quot;").replace(/\s+/g, " ").trim();
}

export function nodeLine(indent: string, id: string, label: string, className: string): string {
  return `${indent}${id}["${escapeLabel(label)}"]:::${className}`;
}

export function edgeLine(indent: string, sources: string[], target: string, arrow: Arrow = "-->"): string {
  return `${indent}${sources.join(" & ")} ${arrow} ${target}`;
}

/** Every (source, target) pair an edge statement draws. */
export function edgePairs(groups: NodeRef[][]): Array<[string, string]> {
  return edgeLinks(groups, []).map(l => [l.source, l.target]);
}

export function edgeLinks(groups: NodeRef[][], arrows: Arrow[]): Array<{ source: string; target: string; arrow: Arrow }> {
  const links: Array<{ source: string; target: string; arrow: Arrow }> = [];
  for (let i = 0; i + 1 < groups.length; i++) {
    const arrow = arrows[i] ?? "-->";
    for (const a of groups[i]) for (const b of groups[i + 1]) links.push({ source: a.id, target: b.id, arrow });
  }
  return links;
}

/**
 * Task IDs named anywhere in a line the codec does not model, outside labels,
 * quoted text and comments.
 */
export function looseTaskRefs(text: string): string[] {
  const bare = text
    .replace(/%%.*/, "")
    .replace(/"[^"]*"/g, " ")
    .replace(/\|[^|]*\|/g, " ")
    .replace(/\[[^\]]*\]|\([^)]*\)|\{[^}]*\}/g, " ");
  return (bare.match(/[\w.]+/g) ?? []).filter(t => refKind(t) === "task");
}
