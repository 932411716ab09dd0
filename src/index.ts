export * from './engine/types.js';
export { createGlicko2, type Glicko2, type Glicko2Options } from './engine/glicko2.js';
export { parseOutcome } from './engine/outcome.js';
export { SeatLookup } from './engine/seats.js';
export { RoundDeltaLedger } from './engine/deltas.js';
export { resolveRound, type RoundContext } from './engine/round.js';
export { propagateRatings, type PropagationInput, type PropagationResult } from './engine/propagate.js';
export { RosterStore } from './store/roster.js';
export { parseRoster } from './formats/roster.js';
export { parseResults, sortRounds, type RoundTable } from './formats/results.js';
export { formatTable, parseTsv } from './formats/tsv.js';
export type { LoadOptions } from './formats/types.js';
export { buildChangesTable, buildRatingsTable, type Table } from './report/tables.js';
export { DiagnosticLog, logDiagnostic, type Diagnostic, type DiagnosticCode } from './diagnostics.js';
export { MalformedRecordError, OutputWriteError, UnknownPlayerError } from './errors.js';
export { ConfigError, loadConfig, type ConfigOverrides, type RatingConfig } from './config.js';
export { runTournament, writeReports, type TournamentOptions, type TournamentRun } from './tournament.js';
