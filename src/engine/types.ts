/**
 * Glicko-2 rating on the public scale: `mu` is the skill estimate, `phi` the
 * rating deviation and `sigma` the volatility.
 */
export interface Rating {
  readonly mu: number;
  readonly phi: number;
  readonly sigma: number;
}

export type PlayerId = string;
export type RoundId = string;

export type GameResult = 'W' | 'L' | 'D';

/**
 * Pairwise update capability. With `drawn` false the first rating is the
 * winner's; both new ratings come from one call.
 */
export interface RatingUpdater {
  update(first: Rating, second: Rating, drawn: boolean): [Rating, Rating];
}

export interface RosterEntry {
  playerId: PlayerId;
  name: string;
  rating: Rating;
}

export interface ResultRow {
  playerId: PlayerId;
  name: string;
  seat: number;
  /** Skill value as printed in the results sheet, the baseline for overall gain. */
  inputRating: number;
  outcomes: ReadonlyMap<RoundId, string>;
}

export type Outcome =
  | { kind: 'game'; result: GameResult; opponentSeat: number }
  | { kind: 'no_game'; reason: 'bye' | 'half_bye' | 'unpaired' | 'blank' }
  /** `opponentSeat` is set when only the result letter is unrecognised. */
  | { kind: 'invalid'; token: string; opponentSeat?: number };

export type LoadMode = 'strict' | 'lenient';

export interface PairingRecord {
  players: [PlayerId, PlayerId];
  /** Result from the first player's point of view. */
  result: GameResult;
  deltas: [number, number];
}

export interface RoundSummary {
  round: RoundId;
  pairings: PairingRecord[];
  noGame: PlayerId[];
  skipped: number;
}
