import type { RoundDeltaLedger } from '../engine/deltas.js';
import { P } from '../engine/params.js';
import type { Rating, ResultRow, RoundId } from '../engine/types.js';
import type { RosterStore } from '../store/roster.js';

export const RATING_COLUMNS = ['ID', 'Name', 'Rating', 'RD', 'RV'] as const;
export const OVERALL_GAIN_COLUMN = 'overall gain';

export interface Table {
  header: string[];
  rows: Array<Array<string | number>>;
}

// Rounding only happens here; the engine carries full precision.
export const roundSigma = (sigma: number) => Number(sigma.toFixed(P.output.sigmaDigits));
// + 0 turns -0 into 0
const roundInt = (value: number) => Math.round(value) + 0;

const ratingCells = (rating: Rating) => [roundInt(rating.mu), roundInt(rating.phi), roundSigma(rating.sigma)];

export function buildRatingsTable(roster: RosterStore): Table {
  return {
    header: [...RATING_COLUMNS],
    rows: roster.entries().map((entry) => [entry.playerId, entry.name, ...ratingCells(entry.rating)]),
  };
}

/**
 * One row per player in the results sheet: final rating, the rounded delta for
 * each round and the gain over the rating printed in the sheet.
 */
export function buildChangesTable(
  rows: readonly ResultRow[],
  rounds: readonly RoundId[],
  roster: RosterStore,
  deltas: RoundDeltaLedger
): Table {
  const baselines = new Map<string, number>();
  for (const row of rows) baselines.set(row.playerId, row.inputRating);

  const tableRows: Table['rows'] = [];
  for (const [playerId, baseline] of baselines) {
    const entry = roster.getEntry(playerId);
    if (!entry) continue;
    const finalMu = roundInt(entry.rating.mu);
    tableRows.push([
      playerId,
      entry.name,
      ...ratingCells(entry.rating),
      ...rounds.map((round) => roundInt(deltas.get(playerId, round))),
      finalMu - baseline,
    ]);
  }

  return {
    header: [...RATING_COLUMNS, ...rounds, OVERALL_GAIN_COLUMN],
    rows: tableRows,
  };
}
