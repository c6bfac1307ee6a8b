import path from "node:path";
import { Command } from "commander";
import { loadConfig } from "./config.js";
import type { RoadmapConfig } from "./config.js";
import { findProjectRoot, listRoadmaps, resolveRoadmap } from "./documents.js";
import { parseRoadmap } from "./parser.js";
import { promote, reconcile } from "./pipeline.js";
import type { ReconcileResult, ReconcileSuccess } from "./pipeline.js";
import { plural, readText, writeFileAtomic } from "./utils.js";
import type { Bucket, DanglingReferenceWarning } from "./types.js";

export const BUCKET_LABELS: Record<Bucket, string> = {
  "blocked": "Blocked",
  "todo": "To-Do",
  "in-progress": "In Progress",
  "done": "Done",
};

type GlobalOpts = { dir?: string };
type UpdateOpts = { dryRun?: boolean; check?: boolean; silent?: boolean };
type StatusOpts = { json?: boolean; ndjson?: boolean };

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function printWarnings(warnings: DanglingReferenceWarning[], rel: string) {
  for (const w of warnings) console.warn(`WARN [${w.kind}] ${rel}:${w.line + 1} ${w.message}`);
}

function printMoves(result: ReconcileSuccess) {
  for (const m of result.moves) {
    console.log(`  ${m.taskId}: ${BUCKET_LABELS[m.from]} -> ${BUCKET_LABELS[m.to]}`);
  }
  if (result.unblocked.length) console.log(`  Unblocked: ${result.unblocked.join(", ")}`);
  if (result.promotions.length) console.log(`  Ready to start: ${result.promotions.join(", ")}`);
}

function succeeded(result: ReconcileResult, rel: string): ReconcileSuccess {
  printWarnings(result.warnings, rel);
  if (!result.ok) throw result.error;
  return result;
}

export function buildProgram(version = "0.0.0"): Command {
  const program = new Command();

  program
    .name("roadmap-sync")
    .description("Keep a Markdown roadmap's checklists and dependency diagrams in agreement")
    .version(version)
    .option("-C, --dir <path>", "run as if started in <path>");

  const context = async () => {
    const { dir } = program.opts<GlobalOpts>();
    const cwd = await findProjectRoot(path.resolve(process.cwd(), dir ?? "."));
    const { config } = await loadConfig(cwd);
    return { cwd, config };
  };

  const load = async (cwd: string, config: RoadmapConfig, file?: string) => {
    const abs = await resolveRoadmap(cwd, file, config.documents);
    return { abs, rel: path.relative(cwd, abs) || abs, text: await readText(abs) };
  };

  program
    .command("update")
    .description("Reclassify tasks, move checklist entries and regenerate diagrams")
    .argument("[file]", "roadmap document (default: first match of config.documents)")
    .option("--dry-run", "print the moves without writing")
    .option("--check", "exit 1 if the document is not up to date; write nothing")
    .option("--silent", "suppress output on success (errors still shown)")
    .action(async (file: string | undefined, opts: UpdateOpts) => {
      try {
        const { cwd, config } = await context();
        const { abs, rel, text } = await load(cwd, config, file);
        const result = succeeded(reconcile(text, config), rel);

        if (opts.check) {
          if (result.changed) {
            console.error(`✖ ${rel} is out of date (${plural(result.moves.length, "move")})`);
            process.exitCode = 1;
          } else if (!opts.silent) {
            console.log(`✔ ${rel} is up to date`);
          }
          return;
        }
        if (opts.dryRun) {
          if (!opts.silent) {
            console.log(`✔ ${rel}: ${result.changed ? plural(result.moves.length, "move") : "no changes"}`);
            printMoves(result);
            console.log("  (dry-run) No files written.");
          }
          return;
        }
        if (result.changed) await writeFileAtomic(abs, result.text);
        if (!opts.silent) {
          console.log(result.changed ? `✔ Updated ${rel}` : `✔ ${rel} is up to date`);
          printMoves(result);
        }
      } catch (e) {
        console.error(`✖ update failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("check")
    .description("Verify that every roadmap is a fixed point; writes nothing")
    .argument("[globs...]", "documents to check (default: config.documents)")
    .action(async (globs: string[]) => {
      try {
        const { cwd, config } = await context();
        const files = await listRoadmaps(cwd, globs.length ? globs : config.documents);
        if (!files.length) throw new Error("no roadmap documents matched");
        let bad = 0;
        for (const f of files) {
          const rel = path.relative(cwd, f);
          const result = reconcile(await readText(f), config);
          printWarnings(result.warnings, rel);
          if (!result.ok) {
            bad++;
            console.error(`✖ ${rel}: ${result.error.message}`);
          } else if (result.changed) {
            bad++;
            console.error(`✖ ${rel}: out of date (${plural(result.moves.length, "move")})`);
          } else {
            console.log(`✔ ${rel}`);
          }
        }
        if (bad) process.exitCode = 1;
      } catch (e) {
        console.error(`✖ check failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("status")
    .description("Show every task with its section and computed status")
    .argument("[file]", "roadmap document")
    .option("--json", "print a JSON array")
    .option("--ndjson", "newline-delimited JSON (1 object per line)")
    .action(async (file: string | undefined, opts: StatusOpts) => {
      try {
        const { cwd, config } = await context();
        const { rel, text } = await load(cwd, config, file);
        const result = succeeded(reconcile(text, config), rel);
        const doc = parseRoadmap(text);
        const rows = Array.from(doc.tasks.values()).map(t => {
          const c = result.classification.get(t.id);
          return {
            id: t.id,
            milestone: t.milestone,
            section: t.manualBucket,
            status: c?.status ?? t.manualBucket,
            reason: c?.reason ?? null,
            waitingOn: c?.waitingOn ?? [],
            dangling: c?.dangling ?? [],
            description: t.description,
          };
        });
        if (opts.ndjson) {
          for (const r of rows) console.log(JSON.stringify(r));
        } else if (opts.json) {
          console.log(JSON.stringify(rows, null, 2));
        } else {
          for (const r of rows) {
            const moved = r.section !== r.status ? ` (was ${BUCKET_LABELS[r.section]})` : "";
            const waiting = r.waitingOn.length ? ` [waiting on ${r.waitingOn.join(", ")}]` : "";
            console.log(`${r.id.padEnd(8)} ${BUCKET_LABELS[r.status].padEnd(11)} ${r.description}${waiting}${moved}`);
          }
        }
      } catch (e) {
        console.error(`✖ status failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("next")
    .description("List ready To-Do tasks that could be started")
    .argument("[file]", "roadmap document")
    .action(async (file: string | undefined) => {
      try {
        const { cwd, config } = await context();
        const { rel, text } = await load(cwd, config, file);
        const result = succeeded(reconcile(text, config), rel);
        if (!result.promotions.length) {
          console.log("No tasks are ready to start.");
          return;
        }
        const doc = parseRoadmap(text);
        for (const id of result.promotions) console.log(`${id.padEnd(8)} ${doc.tasks.get(id)?.description ?? ""}`.trimEnd());
      } catch (e) {
        console.error(`✖ next failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  program
    .command("promote")
    .description("Move a ready task into In Progress and update the roadmap")
    .argument("<id>", "task ID, e.g. 1WA.2")
    .argument("[file]", "roadmap document")
    .option("--silent", "suppress output on success (errors still shown)")
    .action(async (id: string, file: string | undefined, opts: { silent?: boolean }) => {
      try {
        const { cwd, config } = await context();
        const { abs, rel, text } = await load(cwd, config, file);
        const result = succeeded(promote(text, id, config), rel);
        await writeFileAtomic(abs, result.text);
        if (!opts.silent) {
          console.log(`✔ Started ${id} in ${rel}`);
          printMoves(result);
        }
      } catch (e) {
        console.error(`✖ promote failed: ${errorMessage(e)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
