import type { PlayerId, Rating, RosterEntry } from '../engine/types.js';

/**
 * Mutable roster threaded through every round of a run. Ratings are replaced,
 * never edited in place.
 */
export class RosterStore {
  private readonly players = new Map<PlayerId, RosterEntry>();

  static fromEntries(entries: Iterable<RosterEntry>) {
    const store = new RosterStore();
    for (const entry of entries) store.put(entry.playerId, entry.name, entry.rating);
    return store;
  }

  has(playerId: PlayerId) {
    return this.players.has(playerId);
  }

  get(playerId: PlayerId): Rating | undefined {
    return this.players.get(playerId)?.rating;
  }

  getEntry(playerId: PlayerId): RosterEntry | undefined {
    const entry = this.players.get(playerId);
    return entry ? { ...entry } : undefined;
  }

  put(playerId: PlayerId, name: string, rating: Rating) {
    this.players.set(playerId, { playerId, name, rating: { ...rating } });
  }

  /** Replaces the rating, keeping the stored display name. */
  setRating(playerId: PlayerId, rating: Rating) {
    const entry = this.players.get(playerId);
    if (!entry) throw new Error(`player ${playerId} is not on the roster`);
    this.put(playerId, entry.name, rating);
  }

  entries(): RosterEntry[] {
    return Array.from(this.players.values(), (entry) => ({ ...entry }));
  }
}
