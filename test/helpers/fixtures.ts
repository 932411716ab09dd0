import type { Rating, RatingUpdater, ResultRow } from '../../src/engine/types.js';
import { RosterStore } from '../../src/store/roster.js';

export interface UpdateCall {
  first: Rating;
  second: Rating;
  drawn: boolean;
}

/**
 * Deterministic updater: the winner gains `step`, the loser drops `step`,
 * a draw moves the lower-rated player up by `step / 2` and the other down.
 */
export const createStubUpdater = (step = 10) => {
  const calls: UpdateCall[] = [];
  const updater: RatingUpdater = {
    update(first, second, drawn) {
      calls.push({ first, second, drawn });
      if (drawn) {
        if (first.mu === second.mu) return [{ ...first }, { ...second }];
        const shift = first.mu < second.mu ? step / 2 : -step / 2;
        return [
          { ...first, mu: first.mu + shift },
          { ...second, mu: second.mu - shift },
        ];
      }
      return [
        { ...first, mu: first.mu + step },
        { ...second, mu: second.mu - step },
      ];
    },
  };
  return { updater, calls };
};

export const rating = (mu: number, phi = 200, sigma = 0.06): Rating => ({ mu, phi, sigma });

export const buildRoster = (players: Array<[id: string, name: string, mu: number]>) =>
  RosterStore.fromEntries(players.map(([playerId, name, mu]) => ({ playerId, name, rating: rating(mu) })));

export const buildRow = (
  playerId: string,
  seat: number,
  outcomes: Record<string, string>,
  inputRating = 1500
): ResultRow => ({
  playerId,
  name: `Player ${playerId}`,
  seat,
  inputRating,
  outcomes: new Map(Object.entries(outcomes)),
});
