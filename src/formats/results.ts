import type { ResultRow, RoundId } from '../engine/types.js';
import { MalformedRecordError } from '../errors.js';
import { rejectRecord, type LoadOptions } from './types.js';
import { isBlankRecord, parseTsv } from './tsv.js';

export const REQUIRED_RESULT_COLUMNS = ['ID', 'Name', 'Rating'] as const;

const ROUND_PREFIXES = ['Rnd', 'Round ', 'RD'];
// "RD" alone is the rating deviation column, not a round.
const DEVIATION_COLUMN = 'RD';

const INTEGER = /^[+-]?\d+$/;

export interface RoundTable {
  rows: ResultRow[];
  /** Round column headers in play order. */
  rounds: RoundId[];
}

export const isRoundHeader = (header: string) =>
  header !== DEVIATION_COLUMN && ROUND_PREFIXES.some((prefix) => header.startsWith(prefix));

export const roundNumber = (header: string) => {
  const digits = header.replace(/\D/g, '');
  return digits ? Number(digits) : undefined;
};

/** Orders round headers by the digits they carry, so Rnd10 follows Rnd2. */
export function sortRounds(headers: readonly string[]): RoundId[] {
  return headers
    .map((header) => ({ header, order: roundNumber(header) ?? Number.POSITIVE_INFINITY }))
    .sort((a, b) => a.order - b.order)
    .map((entry) => entry.header);
}

export function parseResults(text: string, options: LoadOptions): RoundTable {
  const [headerRecord, ...records] = parseTsv(text);
  if (!headerRecord || isBlankRecord(headerRecord)) {
    throw new MalformedRecordError(`${options.source ?? 'results table'} has no header row`, {
      source: options.source,
      line: 1,
    });
  }

  const header = headerRecord.fields.map((field) => field.trim());
  const missing = REQUIRED_RESULT_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new MalformedRecordError(
      `${options.source ?? 'results table'} is missing column(s) ${missing.join(', ')}`,
      { source: options.source, line: headerRecord.line, record: headerRecord.raw }
    );
  }

  const roundHeaders: string[] = [];
  for (const column of header) {
    if (!column || !isRoundHeader(column)) continue;
    if (roundNumber(column) === undefined) {
      rejectRecord(options, headerRecord, `round column '${column}' has no round number`);
      continue;
    }
    if (!roundHeaders.includes(column)) roundHeaders.push(column);
  }
  const rounds = sortRounds(roundHeaders);

  const columnIndex = (name: string) => header.indexOf(name);
  const idIndex = columnIndex('ID');
  const nameIndex = columnIndex('Name');
  const ratingIndex = columnIndex('Rating');

  const rows: ResultRow[] = [];
  let seat = 0;
  for (const record of records) {
    if (isBlankRecord(record)) continue;
    // skipped rows keep their seat so opponent references stay aligned
    seat += 1;

    const cell = (index: number) => (record.fields[index] ?? '').trim();
    const playerId = cell(idIndex);
    const rating = cell(ratingIndex);

    if (!playerId) {
      rejectRecord(options, record, 'ID is empty');
      continue;
    }
    if (!INTEGER.test(rating)) {
      rejectRecord(options, record, `Rating '${rating}' is not a whole number`);
      continue;
    }

    rows.push({
      playerId,
      name: cell(nameIndex),
      seat,
      inputRating: Number(rating),
      outcomes: new Map(rounds.map((round) => [round, cell(columnIndex(round))])),
    });
  }

  return { rows, rounds };
}
