import { DiagnosticLog } from '../diagnostics.js';
import { UnknownPlayerError } from '../errors.js';
import type { RosterStore } from '../store/roster.js';
import { RoundDeltaLedger } from './deltas.js';
import { resolveRound } from './round.js';
import { SeatLookup } from './seats.js';
import type { LoadMode, RatingUpdater, ResultRow, RoundId, RoundSummary } from './types.js';

export interface PropagationInput {
  roster: RosterStore;
  rows: readonly ResultRow[];
  /** Already in play order; the driver never reorders them. */
  rounds: readonly RoundId[];
  updater: RatingUpdater;
  mode: LoadMode;
  diagnostics?: DiagnosticLog;
  onRound?: (round: RoundId, summary: RoundSummary) => void;
}

export interface PropagationResult {
  roster: RosterStore;
  deltas: RoundDeltaLedger;
  rounds: RoundSummary[];
  diagnostics: DiagnosticLog;
}

export function propagateRatings(input: PropagationInput): PropagationResult {
  const { roster, rows, rounds, updater, mode } = input;
  const diagnostics = input.diagnostics ?? new DiagnosticLog();

  const missing = [...new Set(rows.map((row) => row.playerId))].filter((id) => !roster.has(id));
  if (missing.length) {
    if (mode === 'strict') {
      throw new UnknownPlayerError(`Players missing from roster: ${missing.join(', ')}`, { missing });
    }
    for (const playerId of missing) {
      diagnostics.report({
        code: 'unknown_player',
        message: `Player ${playerId} appears in the results but not on the roster; their games will be skipped`,
        playerId,
      });
    }
  }

  const seats = SeatLookup.fromRows(rows);
  const deltas = new RoundDeltaLedger(
    rows.map((row) => row.playerId),
    rounds
  );

  const summaries: RoundSummary[] = [];
  for (const round of rounds) {
    const summary = resolveRound(round, { roster, rows, seats, updater, deltas, diagnostics });
    summaries.push(summary);
    input.onRound?.(round, summary);
  }

  return { roster, deltas, rounds: summaries, diagnostics };
}
