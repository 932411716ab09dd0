import type { GameResult, Outcome } from './types.js';

const NO_GAME_TOKENS = new Map<string, Extract<Outcome, { kind: 'no_game' }>['reason']>([
  ['-B-', 'bye'],
  ['-H-', 'half_bye'],
  ['-U-', 'unpaired'],
]);

// result letter followed by the opponent's seat
const GAME_TOKEN = /^(\D)(\d+)$/;

const toGameResult = (letter: string | undefined): GameResult | undefined =>
  letter === 'W' || letter === 'L' || letter === 'D' ? letter : undefined;

export const parseOutcome = (raw: string | undefined): Outcome => {
  const token = (raw ?? '').trim();
  if (!token) return { kind: 'no_game', reason: 'blank' };

  const reason = NO_GAME_TOKENS.get(token);
  if (reason) return { kind: 'no_game', reason };

  const match = GAME_TOKEN.exec(token);
  const seat = Number(match?.[2]);
  if (!match || !Number.isSafeInteger(seat) || seat < 1) return { kind: 'invalid', token };

  const result = toGameResult(match[1]);
  if (!result) return { kind: 'invalid', token, opponentSeat: seat };
  return { kind: 'game', result, opponentSeat: seat };
};

export const mirrorResult = (result: GameResult): GameResult =>
  result === 'W' ? 'L' : result === 'L' ? 'W' : 'D';
