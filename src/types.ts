export type Bucket = "blocked" | "todo" | "in-progress" | "done";

export const BUCKETS: readonly Bucket[] = ["blocked", "todo", "in-progress", "done"];

// Manual placement survives classification only while the task is unblocked.
export type Placement =
  | { kind: "automatic" }
  | { kind: "pinned"; bucket: "in-progress" };

export type TaskId = string;

export type Task = {
  id: TaskId;
  milestone: number;
  category: string;
  sequence: number;
  subAlpha?: string;
  description: string;
  dependencies: TaskId[];
  explicitlyDone: boolean;
  // Section the entry sits in, as last written
  manualBucket: Bucket;
  placement: Placement;
  // 0-based index of the checklist line
  line: number;
};

export type DependencyEdge = { from: TaskId; to: TaskId };

export type TaskEntry = {
  taskId: TaskId;
  start: number;
  end: number;
};

export type Section = {
  bucket: Bucket;
  headingLine: number;
  anchor?: string;
  start: number;
  end: number;
  entries: TaskEntry[];
};

export type DiagramScope = "aggregate" | number;

// Link as written, label included: `-->`, `--->`, `-->|needs|`, `-- needs -->`
export type Arrow = string;

export type NodeRef = {
  id: string;
  // Shape and label text exactly as written, e.g. `["Setup"]`
  shape: string;
  className?: string;
};

export type DiagramStatement =
  | { kind: "header"; text: string }
  | { kind: "classDef"; name: string; text: string }
  | { kind: "node"; indent: string; ref: NodeRef; text: string }
  | { kind: "edge"; indent: string; groups: NodeRef[][]; arrows: Arrow[]; text: string }
  | { kind: "class"; indent: string; ids: string[]; className: string; text: string }
  | { kind: "directive"; keyword: "style" | "click"; id: string; text: string }
  | { kind: "blank"; text: string }
  | { kind: "other"; text: string };

export type DiagramBlock = {
  scope: DiagramScope;
  // Line index of the opening and closing fences
  open: number;
  close: number;
  statements: DiagramStatement[];
};

export type Milestone = {
  number: number;
  title: string;
  headingLine: number;
  start: number;
  end: number;
  taskIds: TaskId[];
  sections: Record<Bucket, Section>;
  diagram: DiagramBlock;
};

export type RoadmapDocument = {
  // Lines with their terminators; joining them yields the source text
  lines: string[];
  eol: string;
  milestones: Milestone[];
  tasks: Map<TaskId, Task>;
  aggregate: DiagramBlock;
};

export type ClassNames = {
  open: string;
  blocked: string;
  milestone: string;
};

export const CLASS_KEYS: ReadonlyArray<keyof ClassNames> = ["open", "blocked", "milestone"];

export type RenderOptions = {
  classes: ClassNames;
  classDefs: Record<keyof ClassNames, string>;
  indent: string;
};

export type DanglingReferenceWarning = {
  kind: "dangling-reference";
  source: "checklist" | "diagram";
  taskId?: TaskId;
  reference: string;
  line: number;
  message: string;
};
