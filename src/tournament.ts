import { readFile, writeFile } from 'node:fs/promises';

import { DiagnosticLog } from './diagnostics.js';
import { createGlicko2 } from './engine/glicko2.js';
import { propagateRatings, type PropagationResult } from './engine/propagate.js';
import type { LoadMode, RatingUpdater, ResultRow, RoundId, RoundSummary } from './engine/types.js';
import { OutputWriteError } from './errors.js';
import { parseResults } from './formats/results.js';
import { parseRoster } from './formats/roster.js';
import { formatTable } from './formats/tsv.js';
import { buildChangesTable, buildRatingsTable, type Table } from './report/tables.js';
import { RosterStore } from './store/roster.js';

export interface TournamentOptions {
  rosterFile: string;
  resultsFile: string;
  outputFile: string;
  changesFile?: string;
  mode: LoadMode;
  updater?: RatingUpdater;
  tau?: number;
  diagnostics?: DiagnosticLog;
  onRound?: (round: RoundId, summary: RoundSummary) => void;
}

export interface ReportTarget {
  path: string;
  table: Table;
}

export interface WriteOutcome {
  path: string;
  ok: boolean;
  error?: OutputWriteError;
}

export interface TournamentRun extends PropagationResult {
  rows: ResultRow[];
  roundIds: RoundId[];
  reports: ReportTarget[];
  writes: WriteOutcome[];
}

/**
 * Writes each table in turn. A failed write is reported and the next one is
 * still attempted; the tables stay in memory so a retry needs no recompute.
 */
export async function writeReports(targets: readonly ReportTarget[], diagnostics: DiagnosticLog) {
  const outcomes: WriteOutcome[] = [];
  for (const target of targets) {
    try {
      await writeFile(target.path, formatTable(target.table.header, target.table.rows), 'utf8');
      outcomes.push({ path: target.path, ok: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const error = new OutputWriteError(`Error writing to output file ${target.path}: ${reason}`, {
        path: target.path,
        cause: err,
      });
      diagnostics.report({ code: 'output_write_failure', message: error.message, path: target.path });
      outcomes.push({ path: target.path, ok: false, error });
    }
  }
  return outcomes;
}

export async function runTournament(options: TournamentOptions): Promise<TournamentRun> {
  const diagnostics = options.diagnostics ?? new DiagnosticLog();
  const { mode } = options;

  const rosterText = await readFile(options.rosterFile, 'utf8');
  const resultsText = await readFile(options.resultsFile, 'utf8');

  const roster = RosterStore.fromEntries(
    parseRoster(rosterText, { mode, source: options.rosterFile, diagnostics })
  );
  const { rows, rounds } = parseResults(resultsText, { mode, source: options.resultsFile, diagnostics });

  const result = propagateRatings({
    roster,
    rows,
    rounds,
    updater: options.updater ?? createGlicko2({ tau: options.tau }),
    mode,
    diagnostics,
    onRound: options.onRound,
  });

  const reports: ReportTarget[] = [{ path: options.outputFile, table: buildRatingsTable(result.roster) }];
  if (options.changesFile) {
    reports.push({
      path: options.changesFile,
      table: buildChangesTable(rows, rounds, result.roster, result.deltas),
    });
  }

  const writes = await writeReports(reports, diagnostics);
  return { ...result, rows, roundIds: rounds, reports, writes };
}
