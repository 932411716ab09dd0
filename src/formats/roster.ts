import { z } from 'zod';

import type { RosterEntry } from '../engine/types.js';
import { isBlankRecord, parseTsv } from './tsv.js';
import { rejectRecord, type LoadOptions } from './types.js';

export const ROSTER_COLUMNS = ['ID', 'Name', 'Rating', 'RD', 'RV'] as const;

const NumericCell = z
  .string()
  .trim()
  .min(1, 'is empty')
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const RosterRecordSchema = z.tuple([
  z.string().trim().min(1, 'is empty'),
  z.string().trim(),
  NumericCell,
  NumericCell.pipe(z.number().min(0)),
  NumericCell.pipe(z.number().min(0)),
]);

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => {
      const column = typeof issue.path[0] === 'number' ? ROSTER_COLUMNS[issue.path[0]] : undefined;
      return column ? `${column} ${issue.message}` : issue.message;
    })
    .join('; ');

/**
 * Reads the roster table: a header row, then identity, name, rating,
 * deviation and volatility per tab-separated record.
 */
export function parseRoster(text: string, options: LoadOptions): RosterEntry[] {
  const [, ...records] = parseTsv(text);
  const entries = new Map<string, RosterEntry>();

  for (const record of records) {
    if (isBlankRecord(record)) continue;

    if (record.fields.length !== ROSTER_COLUMNS.length) {
      rejectRecord(
        options,
        record,
        `expected ${ROSTER_COLUMNS.length} tab-separated fields (${ROSTER_COLUMNS.join(', ')}), found ${record.fields.length}`
      );
      continue;
    }

    const parsed = RosterRecordSchema.safeParse(record.fields);
    if (!parsed.success) {
      rejectRecord(options, record, describeIssues(parsed.error));
      continue;
    }

    const [playerId, name, mu, phi, sigma] = parsed.data;
    if (entries.has(playerId)) {
      rejectRecord(options, record, `duplicate player ID ${playerId}`);
      continue;
    }
    entries.set(playerId, { playerId, name, rating: { mu, phi, sigma } });
  }

  return [...entries.values()];
}
