import type { BatchWarning, Hand, IngestSummary, Roster, ShotTable } from "@/lib/domain/types";
import type { Policy } from "@/lib/config/policy";
import { AmbiguousSessionBatchError, CoachGolfError } from "@/lib/errors";
import type { Logger } from "@/lib/log";
import { sessionDateFromRows } from "@/lib/ingest/dates";
import { canonicalizeShots, concatShotTables } from "@/lib/ingest/normalize";
import { parseCsv, type RawTable } from "@/lib/ingest/parse";
import { detectPlayerName } from "@/lib/ingest/player";
import { resolveIdentity } from "@/lib/roster/roster";
import { recomputeSpins } from "@/lib/metrics/spin";

// Everything one run needs; nothing is read from module state.
export type BatchContext = {
  roster: Roster;
  policy: Policy;
  log: Logger;
};

export type BatchFile = { name: string; text: string };

export type BatchPlayer = {
  file: string;
  playerRaw: string;
  alias: string;
  hand: Hand;
  rows: number;
};

export type IngestedBatch = {
  sessionDate: string;
  shots: ShotTable;
  players: BatchPlayer[];
  warnings: BatchWarning[];
  diagnostics: IngestSummary;
};

/**
 * Parses one upload batch into the canonical shot table. Date problems and
 * a batch spanning several session dates are fatal and raised before any
 * shot is built.
 */
export function ingestBatch(files: BatchFile[], ctx: BatchContext): IngestedBatch {
  const { roster, policy, log } = ctx;
  if (files.length === 0) throw new CoachGolfError("Empty batch: no CSV file given");

  const parsed: { raw: RawTable; sessionDate: string }[] = files.map((f) => {
    const raw = parseCsv(f.text, f.name);
    return { raw, sessionDate: sessionDateFromRows(raw.rows, raw.headers, f.name) };
  });

  const distinct = new Set(parsed.map((p) => p.sessionDate));
  if (distinct.size > 1) {
    throw new AmbiguousSessionBatchError(parsed.map((p) => ({ file: p.raw.name, date: p.sessionDate })));
  }
  const sessionDate = parsed[0].sessionDate;

  const warnings: BatchWarning[] = [];
  const players: BatchPlayer[] = [];
  const tables: ShotTable[] = [];
  const unknown = new Set<string>();
  let parseErrors = 0;
  let smashUndefined = 0;
  let spinUndefined = 0;

  for (const { raw } of parsed) {
    parseErrors += raw.errors.length;
    for (const e of raw.errors) log.warn(`${raw.name} row ${e.row}: ${e.message}`);

    const playerRaw = detectPlayerName(raw.rows, raw.headers, raw.name, roster);
    const identity = resolveIdentity(playerRaw, roster);
    if (!identity.resolved) {
      log.warn(`no roster entry for "${playerRaw}" in ${raw.name}`);
      warnings.push({ kind: "unresolved_identity", file: raw.name, playerRaw });
    }

    const canon = canonicalizeShots(raw, { sessionDate, playerRaw, alias: identity.alias, hand: identity.hand }, policy);
    const spun = recomputeSpins(canon.table);
    smashUndefined += canon.smashUndefined;
    spinUndefined += spun.undefinedRows;
    for (const c of canon.unknownColumns) unknown.add(c);

    tables.push(spun.table);
    players.push({ file: raw.name, playerRaw, alias: identity.alias, hand: identity.hand, rows: raw.rowCount });
    log.debug(`${raw.name}: ${raw.rowCount} rows for ${identity.alias}`);
  }

  if (spinUndefined > 0) warnings.push({ kind: "derived_metric_undefined", metric: "SpinTotal", count: spinUndefined });
  if (smashUndefined > 0) warnings.push({ kind: "derived_metric_undefined", metric: "Smash", count: smashUndefined });

  const shots = concatShotTables(tables);
  log.info(`ingested ${files.length} files, ${shots.rows.length} shots, session ${sessionDate}`);
  return {
    sessionDate,
    shots,
    players,
    warnings,
    diagnostics: {
      files: files.length,
      rows: shots.rows.length,
      parse_errors: parseErrors,
      unknown_columns: Array.from(unknown).sort(),
    },
  };
}
