import { test } from 'node:test';
import assert from 'node:assert/strict';

import { DiagnosticLog } from '../../src/diagnostics.js';
import { MalformedRecordError } from '../../src/errors.js';
import { parseRoster } from '../../src/formats/roster.js';

const HEADER = 'ID\tName\tRating\tRD\tRV\n';

test('loads identity, name and rating triple per record', () => {
  const entries = parseRoster(`${HEADER}1\tAlice\t1500\t200\t0.06\n 2 \tBob\t1623\t87\t0.0599\n`, { mode: 'strict' });

  assert.deepEqual(entries, [
    { playerId: '1', name: 'Alice', rating: { mu: 1500, phi: 200, sigma: 0.06 } },
    { playerId: '2', name: 'Bob', rating: { mu: 1623, phi: 87, sigma: 0.0599 } },
  ]);
});

test('ignores blank lines', () => {
  const entries = parseRoster(`${HEADER}\n1\tAlice\t1500\t200\t0.06\n\n`, { mode: 'strict' });

  assert.equal(entries.length, 1);
});

test('aborts on a record with the wrong field count in strict mode', () => {
  assert.throws(
    () => parseRoster(`${HEADER}1\tAlice\t1500\t200\n`, { mode: 'strict', source: 'players.csv' }),
    (err: unknown) =>
      err instanceof MalformedRecordError &&
      err.context.line === 2 &&
      err.context.source === 'players.csv' &&
      err.context.record === '1\tAlice\t1500\t200'
  );
});

test('skips malformed records with a diagnostic in lenient mode', () => {
  const diagnostics = new DiagnosticLog();
  const text = [
    HEADER.trimEnd(),
    '1\tAlice\t1500\t200\t0.06',
    '2\tBob\tabc\t200\t0.06',
    '3\tCara\t1500\t-5\t0.06',
    '1\tAlice again\t1400\t200\t0.06',
    '4\tDev\t1450\t180\t0.05',
  ].join('\n');

  const entries = parseRoster(text, { mode: 'lenient', diagnostics });

  assert.deepEqual(
    entries.map((e) => e.playerId),
    ['1', '4']
  );
  const skipped = diagnostics.byCode('malformed_record');
  assert.deepEqual(
    skipped.map((d) => d.line),
    [3, 4, 5]
  );
  assert.ok(skipped[0].message.includes('Rating'));
  assert.ok(skipped[1].message.includes('RD'));
  assert.ok(skipped[2].message.includes('duplicate player ID 1'));
});
