import type { DiagnosticLog } from '../diagnostics.js';
import type { LoadMode } from '../engine/types.js';
import { MalformedRecordError } from '../errors.js';
import type { TsvRecord } from './tsv.js';

export interface LoadOptions {
  /** strict aborts the load on the first malformed record; lenient skips it with a diagnostic. */
  mode: LoadMode;
  /** Name used in messages, usually the file path. */
  source?: string;
  diagnostics?: DiagnosticLog;
}

export const rejectRecord = (
  options: LoadOptions,
  record: Pick<TsvRecord, 'line' | 'raw'>,
  reason: string
) => {
  const where = options.source ? `${options.source}:${record.line}` : `line ${record.line}`;
  const message = `Malformed record at ${where}: ${reason}`;
  if (options.mode === 'strict') {
    throw new MalformedRecordError(message, {
      source: options.source,
      line: record.line,
      record: record.raw,
    });
  }
  options.diagnostics?.report({
    code: 'malformed_record',
    message: `${message}; record skipped`,
    source: options.source,
    line: record.line,
    token: record.raw,
  });
};
