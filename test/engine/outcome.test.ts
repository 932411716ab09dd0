import { test } from 'node:test';
import assert from 'node:assert/strict';

import { mirrorResult, parseOutcome } from '../../src/engine/outcome.js';

test('parses decisive and drawn results with the opponent seat', () => {
  assert.deepEqual(parseOutcome('W7'), { kind: 'game', result: 'W', opponentSeat: 7 });
  assert.deepEqual(parseOutcome('L12'), { kind: 'game', result: 'L', opponentSeat: 12 });
  assert.deepEqual(parseOutcome(' D3 '), { kind: 'game', result: 'D', opponentSeat: 3 });
});

test('recognises the no-game sentinels', () => {
  assert.deepEqual(parseOutcome('-B-'), { kind: 'no_game', reason: 'bye' });
  assert.deepEqual(parseOutcome('-H-'), { kind: 'no_game', reason: 'half_bye' });
  assert.deepEqual(parseOutcome('-U-'), { kind: 'no_game', reason: 'unpaired' });
  assert.deepEqual(parseOutcome(''), { kind: 'no_game', reason: 'blank' });
  assert.deepEqual(parseOutcome(undefined), { kind: 'no_game', reason: 'blank' });
});

test('flags tokens without a usable seat as invalid', () => {
  for (const token of ['W', 'Wx', 'W0', '4', 'constructor']) {
    assert.deepEqual(parseOutcome(token), { kind: 'invalid', token }, token);
  }
});

test('keeps the seat when only the result letter is unknown', () => {
  assert.deepEqual(parseOutcome('X4'), { kind: 'invalid', token: 'X4', opponentSeat: 4 });
  assert.deepEqual(parseOutcome('w12'), { kind: 'invalid', token: 'w12', opponentSeat: 12 });
});

test('mirrors results from the opponent side', () => {
  assert.equal(mirrorResult('W'), 'L');
  assert.equal(mirrorResult('L'), 'W');
  assert.equal(mirrorResult('D'), 'D');
});
