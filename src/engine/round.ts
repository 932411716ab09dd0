import type { DiagnosticLog } from '../diagnostics.js';
import type { RosterStore } from '../store/roster.js';
import type { RoundDeltaLedger } from './deltas.js';
import { mirrorResult, parseOutcome } from './outcome.js';
import type { SeatLookup } from './seats.js';
import type { GameResult, PairingRecord, PlayerId, Rating, RatingUpdater, ResultRow, RoundId, RoundSummary } from './types.js';

export interface RoundContext {
  roster: RosterStore;
  rows: readonly ResultRow[];
  seats: SeatLookup;
  updater: RatingUpdater;
  deltas: RoundDeltaLedger;
  diagnostics: DiagnosticLog;
}

// Returns the new ratings as [player, opponent] whatever order the updater wants.
const applyResult = (
  updater: RatingUpdater,
  result: GameResult,
  player: Rating,
  opponent: Rating
): [Rating, Rating] => {
  switch (result) {
    case 'W':
      return updater.update(player, opponent, false);
    case 'L': {
      const [winner, loser] = updater.update(opponent, player, false);
      return [loser, winner];
    }
    case 'D':
      return updater.update(player, opponent, true);
  }
};

const mirrors = (opponentToken: string | undefined, result: GameResult, playerSeat: number) => {
  const outcome = parseOutcome(opponentToken);
  return (
    outcome.kind === 'game' &&
    outcome.result === mirrorResult(result) &&
    outcome.opponentSeat === playerSeat
  );
};

/**
 * Scores every game of one round exactly once, updating the roster in place
 * and recording each player's skill change for the round.
 */
export function resolveRound(round: RoundId, context: RoundContext): RoundSummary {
  const { roster, rows, seats, updater, deltas, diagnostics } = context;
  const resolved = new Set<PlayerId>();
  const pairings: PairingRecord[] = [];
  const noGame: PlayerId[] = [];
  let skipped = 0;

  const rowsBySeat = new Map(rows.map((row) => [row.seat, row]));

  for (const row of rows) {
    const playerId = row.playerId;
    if (resolved.has(playerId)) continue;

    const token = row.outcomes.get(round);
    const outcome = parseOutcome(token);

    if (outcome.kind === 'no_game') {
      resolved.add(playerId);
      noGame.push(playerId);
      continue;
    }

    const opponentSeat = outcome.opponentSeat;
    if (opponentSeat === undefined) {
      // no opponent to pair, so the other side's row may still score the game
      skipped += 1;
      diagnostics.report({
        code: 'invalid_outcome',
        message: `Invalid game result '${token}' for player ${playerId} in ${round}; game skipped`,
        round,
        playerId,
        token,
      });
      continue;
    }

    const opponentId = seats.resolve(opponentSeat);
    if (opponentId === undefined) {
      skipped += 1;
      diagnostics.report({
        code: 'unknown_opponent',
        message: `Player ${playerId} in ${round} references seat ${opponentSeat}, which has no player; game skipped`,
        round,
        playerId,
        seat: opponentSeat,
        token,
      });
      continue;
    }

    if (opponentId === playerId) {
      skipped += 1;
      diagnostics.report({
        code: 'invalid_outcome',
        message: `Player ${playerId} in ${round} is paired against their own seat; game skipped`,
        round,
        playerId,
        seat: opponentSeat,
        token,
      });
      continue;
    }

    if (resolved.has(opponentId)) {
      skipped += 1;
      diagnostics.report({
        code: 'opponent_already_resolved',
        message: `Player ${playerId} in ${round} references seat ${opponentSeat} (player ${opponentId}), who already has a result this round; game skipped`,
        round,
        playerId,
        seat: opponentSeat,
        token,
      });
      continue;
    }

    // from here on the pairing is settled for the round, scored or not
    resolved.add(playerId);
    resolved.add(opponentId);

    if (outcome.kind === 'invalid') {
      skipped += 1;
      diagnostics.report({
        code: 'invalid_outcome',
        message: `Invalid game result '${outcome.token}' for player ${playerId} in ${round}; game against ${opponentId} skipped`,
        round,
        playerId,
        seat: opponentSeat,
        token: outcome.token,
      });
      continue;
    }

    const playerRating = roster.get(playerId);
    const opponentRating = roster.get(opponentId);
    if (!playerRating || !opponentRating) {
      skipped += 1;
      const missing = playerRating ? opponentId : playerId;
      diagnostics.report({
        code: 'unknown_player',
        message: `Player ${missing} is not on the roster; ${round} game between ${playerId} and ${opponentId} skipped`,
        round,
        playerId: missing,
        token,
      });
      continue;
    }

    const [playerNext, opponentNext] = applyResult(updater, outcome.result, playerRating, opponentRating);
    roster.setRating(playerId, playerNext);
    roster.setRating(opponentId, opponentNext);

    const playerDelta = playerNext.mu - playerRating.mu;
    const opponentDelta = opponentNext.mu - opponentRating.mu;
    deltas.record(playerId, round, playerDelta);
    deltas.record(opponentId, round, opponentDelta);

    pairings.push({
      players: [playerId, opponentId],
      result: outcome.result,
      deltas: [playerDelta, opponentDelta],
    });

    const opponentToken = rowsBySeat.get(opponentSeat)?.outcomes.get(round);
    if (!mirrors(opponentToken, outcome.result, row.seat)) {
      diagnostics.report({
        code: 'outcome_mismatch',
        message: `${round}: player ${playerId} reported '${token}' but player ${opponentId} reported '${opponentToken ?? ''}'; scored from ${playerId}'s row`,
        round,
        playerId: opponentId,
        token: opponentToken,
      });
    }
  }

  return { round, pairings, noGame, skipped };
}
