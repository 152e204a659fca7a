import { promises as fs } from "fs";
import path from "path";
import { parseArgs } from "util";
import { DEFAULT_POLICY } from "@/lib/config/policy";
import { loadEnv } from "@/lib/config/env";
import { errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/log";
import { runBatch } from "@/lib/pipeline/generate";
import { loadRoster } from "@/lib/roster/roster";
import { LocalStorage } from "@/lib/storage/local";
import { listReports, listSessionsForAlias } from "@/lib/storage/persist";

const USAGE = `usage:
  coach-golf generate [--roster roster.json] [--out ./out] <file.csv>...
  coach-golf sessions [--out ./out] --alias <alias> [--date YYYY-MM-DD]`;

async function generate(args: string[]) {
  const env = loadEnv();
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      roster: { type: "string", default: env.COACH_GOLF_ROSTER },
      out: { type: "string", default: env.COACH_GOLF_OUT_DIR },
    },
  });
  if (positionals.length === 0) throw new Error(`no CSV file given\n${USAGE}`);

  const out = values.out ?? env.COACH_GOLF_OUT_DIR;
  const log = createLogger("ingest", env.COACH_GOLF_LOG_LEVEL);
  const roster = await loadRoster(values.roster ?? env.COACH_GOLF_ROSTER);
  const files = await Promise.all(
    positionals.map(async (p) => ({ name: path.basename(p), text: await fs.readFile(p, "utf8") }))
  );
  const storage = new LocalStorage(out);
  const run = await runBatch(files, { roster, policy: DEFAULT_POLICY, log }, { storage, rootId: storage.rootId });

  const state = run.store.getState();
  for (const w of state.warnings) log.warn(JSON.stringify(w));
  for (const e of state.errors) log.error(`${e.stage}: ${e.message}`);
  console.log(`session ${run.batch.sessionDate}: ${run.batch.shots.rows.length} shots, ${run.persisted?.written.length ?? 0} files written to ${out}`);
}

async function sessions(args: string[]) {
  const env = loadEnv();
  const { values } = parseArgs({
    args,
    options: {
      out: { type: "string", default: env.COACH_GOLF_OUT_DIR },
      alias: { type: "string" },
      date: { type: "string" },
    },
  });
  if (!values.alias) throw new Error(`--alias is required\n${USAGE}`);
  const storage = new LocalStorage(values.out ?? env.COACH_GOLF_OUT_DIR);
  if (values.date) {
    for (const r of await listReports(storage, storage.rootId, values.alias, values.date)) console.log(r.name);
    return;
  }
  for (const d of await listSessionsForAlias(storage, storage.rootId, values.alias)) console.log(d);
}

async function main(argv: string[]) {
  const [command, ...rest] = argv;
  if (command === "generate") return generate(rest);
  if (command === "sessions") return sessions(rest);
  throw new Error(USAGE);
}

main(process.argv.slice(2)).catch((e: unknown) => {
  console.error(`[coach-golf] ${errorMessage(e)}`);
  process.exitCode = 1;
});
