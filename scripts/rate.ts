#!/usr/bin/env node
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig, type ConfigOverrides } from '../src/config.js';
import { DiagnosticLog, logDiagnostic } from '../src/diagnostics.js';
import type { RoundSummary } from '../src/engine/types.js';
import { runTournament } from '../src/tournament.js';

const printRound = (summary: RoundSummary) => {
  console.log(
    `Processed ${summary.round}: ${summary.pairings.length} game(s), ${summary.noGame.length} without a game, ${summary.skipped} skipped`
  );
};

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('tournament-ratings')
    .usage('$0 [options]\n\nRecompute ratings from a roster and a round-by-round results sheet')
    .option('roster', {
      type: 'string',
      describe: 'Tab-delimited roster: ID, Name, Rating, RD, RV (default: $RATING_ROSTER_FILE or players.csv)',
    })
    .option('results', {
      type: 'string',
      describe: 'Tab-delimited results sheet with one column per round (default: $RATING_RESULTS_FILE or tournament.csv)',
    })
    .option('output', {
      type: 'string',
      describe: 'Where to write the full ratings table (default: $RATING_OUTPUT_FILE or output.csv)',
    })
    .option('changes', {
      type: 'boolean',
      describe: 'Also write the per-round changes table (default: on unless $RATING_CHANGES_FILE is empty)',
    })
    .option('changes-file', {
      type: 'string',
      describe: 'Where to write the per-round changes table (default: $RATING_CHANGES_FILE or changed_players.csv)',
    })
    .option('mode', {
      choices: ['strict', 'lenient'] as const,
      describe: 'strict aborts on bad data; lenient skips it and reports (default: $RATING_LOAD_MODE or strict)',
    })
    .option('tau', {
      type: 'number',
      describe: 'Glicko-2 system constant (default: $GLICKO_TAU or 0.5)',
    })
    .strict()
    .help()
    .parseAsync();

  // flags replace their env variable, which then is not validated
  const overrides: ConfigOverrides = {
    rosterFile: argv.roster,
    resultsFile: argv.results,
    outputFile: argv.output,
    mode: argv.mode,
    tau: argv.tau,
  };
  if (argv.changes === false) overrides.changesFile = undefined;
  else if (argv['changes-file'] !== undefined) overrides.changesFile = argv['changes-file'];
  else if (argv.changes === true) overrides.changesFile = process.env.RATING_CHANGES_FILE || 'changed_players.csv';
  const config = loadConfig(process.env, overrides);

  const diagnostics = new DiagnosticLog(logDiagnostic);
  const run = await runTournament({
    ...config,
    diagnostics,
    onRound: (_round, summary) => printRound(summary),
  });

  for (const write of run.writes) {
    if (write.ok) console.log(`Ratings written to ${write.path}`);
    else console.error('output_write_failed', { path: write.path, message: write.error?.message });
  }

  if (diagnostics.entries.length) {
    console.warn(`${diagnostics.entries.length} issue(s) reported; see warnings above`);
  }
}

main().catch((err) => {
  console.error('rating_run_failed', err);
  process.exitCode = 1;
});
