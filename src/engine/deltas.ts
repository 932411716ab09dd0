import type { PlayerId, RoundId } from './types.js';

export class RoundDeltaLedger {
  private readonly deltas = new Map<PlayerId, Map<RoundId, number>>();

  constructor(players: Iterable<PlayerId>, readonly rounds: readonly RoundId[]) {
    for (const playerId of players) {
      if (this.deltas.has(playerId)) continue;
      this.deltas.set(playerId, new Map(rounds.map((round) => [round, 0])));
    }
  }

  record(playerId: PlayerId, round: RoundId, delta: number) {
    let perRound = this.deltas.get(playerId);
    if (!perRound) {
      perRound = new Map(this.rounds.map((r) => [r, 0]));
      this.deltas.set(playerId, perRound);
    }
    perRound.set(round, delta);
  }

  get(playerId: PlayerId, round: RoundId) {
    return this.deltas.get(playerId)?.get(round) ?? 0;
  }

  /** Deltas in round order. */
  forPlayer(playerId: PlayerId): number[] {
    return this.rounds.map((round) => this.get(playerId, round));
  }
}
