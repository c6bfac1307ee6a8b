import { describe, it, expect } from "vitest";
import { classify } from "../classifier.js";
import { parseRoadmap } from "../parser.js";
import { planMoves } from "../reconciler.js";
import { MULTI, WORKED, graphOf } from "./helpers.js";

describe("classify", () => {
  it("marks ticked tasks done whatever their section", () => {
    const c = classify(graphOf([["1WA.1", { done: true, bucket: "todo" }]]));
    expect(c.get("1WA.1")).toEqual({ id: "1WA.1", status: "done", reason: "done", waitingOn: [], dangling: [] });
  });

  it("propagates blocking down a chain", () => {
    const c = classify(graphOf([
      ["1WA.1"],
      ["1WA.2", { deps: ["1WA.1"], bucket: "blocked" }],
      ["1WA.3", { deps: ["1WA.2"], bucket: "blocked" }],
    ]));
    expect(c.get("1WA.1")?.status).toBe("todo");
    expect(c.get("1WA.2")).toMatchObject({ status: "blocked", waitingOn: ["1WA.1"] });
    expect(c.get("1WA.3")).toMatchObject({ status: "blocked", waitingOn: ["1WA.2"] });
  });

  it("readies a task once every dependency is done", () => {
    const c = classify(graphOf([
      ["1WA.1", { done: true }],
      ["1WA.2", { done: true }],
      ["1WA.3", { deps: ["1WA.1", "1WA.2"], bucket: "blocked" }],
    ]));
    expect(c.get("1WA.3")).toMatchObject({ status: "todo", reason: "ready", waitingOn: [] });
  });

  it("keeps an unblocked In Progress task where it is", () => {
    const c = classify(graphOf([
      ["1WA.1", { done: true }],
      ["1WA.2", { deps: ["1WA.1"], bucket: "in-progress" }],
    ]));
    expect(c.get("1WA.2")).toMatchObject({ status: "in-progress", reason: "pinned" });
  });

  it("blocks an In Progress task whose dependency reopened", () => {
    const c = classify(graphOf([
      ["1WA.1"],
      ["1WA.2", { deps: ["1WA.1"], bucket: "in-progress" }],
    ]));
    expect(c.get("1WA.2")).toMatchObject({ status: "blocked", reason: "blocked", waitingOn: ["1WA.1"] });
  });

  it("treats a dangling dependency as satisfied unless the task already waits in Blocked", () => {
    const c = classify(graphOf([
      ["1WA.1", { deps: ["1WA.9"], bucket: "todo" }],
      ["1WA.2", { deps: ["1WA.9"], bucket: "blocked" }],
    ]));
    expect(c.get("1WA.1")).toEqual({ id: "1WA.1", status: "todo", reason: "ready", waitingOn: [], dangling: ["1WA.9"] });
    expect(c.get("1WA.2")).toEqual({ id: "1WA.2", status: "blocked", reason: "dangling", waitingOn: [], dangling: ["1WA.9"] });
  });

  it("returns results in document order", () => {
    const c = classify(graphOf([
      ["1WA.2", { deps: ["1WA.1"] }],
      ["1WA.3", { done: true }],
      ["1WA.1"],
    ]));
    expect(Array.from(c.keys())).toEqual(["1WA.2", "1WA.3", "1WA.1"]);
  });
});

describe("planMoves", () => {
  it("moves the readied task and leaves the rest", () => {
    const doc = parseRoadmap(WORKED);
    const plan = planMoves(doc, classify(doc.tasks));
    expect(plan.moves).toEqual([{ taskId: "1WA.2", milestone: 1, from: "blocked", to: "todo" }]);
    expect(plan.unblocked).toEqual(["1WA.2"]);
    expect(plan.layout.get(1)).toEqual({
      "blocked": ["1WA.3"],
      "todo": ["1WA.2"],
      "in-progress": [],
      "done": ["1WA.1"],
    });
  });

  it("plans nothing for a fixed point", () => {
    const doc = parseRoadmap(MULTI);
    const plan = planMoves(doc, classify(doc.tasks));
    expect(plan.moves).toEqual([]);
    expect(plan.unblocked).toEqual([]);
    expect(plan.layout.get(2)).toEqual({ "blocked": ["2RL.1"], "todo": ["2RL.2"], "in-progress": [], "done": [] });
  });

  it("appends arrivals after the entries that stay", () => {
    const doc = parseRoadmap(MULTI.replace("- [ ] 1WA.1 Set up repo", "- [x] 1WA.1 Set up repo"));
    const plan = planMoves(doc, classify(doc.tasks));
    expect(plan.moves).toEqual([
      { taskId: "1WA.2", milestone: 1, from: "blocked", to: "todo" },
      { taskId: "1WA.1", milestone: 1, from: "in-progress", to: "done" },
    ]);
    expect(plan.layout.get(1)).toEqual({
      "blocked": ["1WA.3"],
      "todo": ["1TI.1", "1WA.2"],
      "in-progress": [],
      "done": ["1WA.1"],
    });
  });
});
