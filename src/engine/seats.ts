import type { PlayerId, ResultRow } from './types.js';

// Outcome tokens name opponents by seat; seats are fixed for the whole tournament.
export class SeatLookup {
  private constructor(private readonly seats: ReadonlyMap<number, PlayerId>) {}

  static fromRows(rows: readonly ResultRow[]) {
    return new SeatLookup(new Map(rows.map((row) => [row.seat, row.playerId])));
  }

  resolve(seat: number): PlayerId | undefined {
    return this.seats.get(seat);
  }
}
