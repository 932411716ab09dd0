// Tab-delimited dialect shared by every input and output table:
// `"` quotes a cell, a doubled quote escapes one, lines end with \n.

const DELIMITER = '\t';
const QUOTE = '"';

export interface TsvRecord {
  /** 1-based physical line the record starts on. */
  line: number;
  fields: string[];
  raw: string;
}

export function parseTsv(text: string): TsvRecord[] {
  const records: TsvRecord[] = [];
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let fields: string[] = [];
  let field = '';
  let quoted = false;
  let fieldStart = true;
  let line = 1;
  let recordLine = 1;
  let recordStart = 0;

  const endRecord = (end: number) => {
    fields.push(field);
    records.push({ line: recordLine, fields, raw: input.slice(recordStart, end) });
    fields = [];
    field = '';
    fieldStart = true;
  };

  for (let i = 0; i < input.length; i += 1) {
    const ch = input[i];

    if (quoted) {
      if (ch === QUOTE) {
        if (input[i + 1] === QUOTE) {
          field += QUOTE;
          i += 1;
        } else {
          quoted = false;
        }
      } else {
        if (ch === '\n') line += 1;
        field += ch;
      }
      continue;
    }

    if (ch === QUOTE && fieldStart) {
      quoted = true;
      fieldStart = false;
      continue;
    }

    if (ch === DELIMITER) {
      fields.push(field);
      field = '';
      fieldStart = true;
      continue;
    }

    if (ch === '\r' && input[i + 1] === '\n') continue;

    if (ch === '\n') {
      endRecord(input[i - 1] === '\r' ? i - 1 : i);
      line += 1;
      recordLine = line;
      recordStart = i + 1;
      continue;
    }

    // leading blanks before an opening quote are skipped, like the writer's reader
    if (fieldStart && ch === ' ') continue;

    field += ch;
    fieldStart = false;
  }

  if (field || fields.length || quoted) endRecord(input.length);

  return records;
}

export const isBlankRecord = (record: TsvRecord) => record.fields.every((f) => !f.trim());

const needsQuoting = (value: string) =>
  value.includes(DELIMITER) || value.includes(QUOTE) || value.includes('\n') || value.includes('\r');

const formatCell = (value: string | number) => {
  const text = String(value);
  return needsQuoting(text) ? `${QUOTE}${text.replaceAll(QUOTE, QUOTE + QUOTE)}${QUOTE}` : text;
};

export function formatTable(header: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>) {
  return [header, ...rows].map((row) => row.map(formatCell).join(DELIMITER) + '\n').join('');
}
