import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { DiagnosticLog } from '../src/diagnostics.js';
import { runTournament, writeReports } from '../src/tournament.js';

const ROSTER = 'ID\tName\tRating\tRD\tRV\n1\tAlice\t1500\t200\t0.06\n2\tBob\t1500\t200\t0.06\n';
const RESULTS = 'ID\tName\tRating\tRnd1\n1\tAlice\t1500\tW2\n2\tBob\t1500\tL1\n';

describe('runTournament', () => {
  let dir = '';

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tournament-ratings-'));
    await writeFile(join(dir, 'players.csv'), ROSTER);
    await writeFile(join(dir, 'tournament.csv'), RESULTS);
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the ratings and changes tables', async () => {
    const rounds: string[] = [];
    const run = await runTournament({
      rosterFile: join(dir, 'players.csv'),
      resultsFile: join(dir, 'tournament.csv'),
      outputFile: join(dir, 'output.csv'),
      changesFile: join(dir, 'changed_players.csv'),
      mode: 'strict',
      tau: 0.5,
      onRound: (round) => rounds.push(round),
    });

    assert.deepEqual(rounds, ['Rnd1']);
    assert.ok(run.writes.every((write) => write.ok));
    assert.equal(
      await readFile(join(dir, 'output.csv'), 'utf8'),
      'ID\tName\tRating\tRD\tRV\n1\tAlice\t1579\t180\t0.05999963\n2\tBob\t1421\t180\t0.05999963\n'
    );
    assert.equal(
      await readFile(join(dir, 'changed_players.csv'), 'utf8'),
      'ID\tName\tRating\tRD\tRV\tRnd1\toverall gain\n1\tAlice\t1579\t180\t0.05999963\t79\t79\n2\tBob\t1421\t180\t0.05999963\t-79\t-79\n'
    );
  });

  it('reports a failed write and still writes the other table', async () => {
    const diagnostics = new DiagnosticLog();
    const outputFile = join(dir, 'missing', 'output.csv');
    const changesFile = join(dir, 'changes-only.csv');

    const run = await runTournament({
      rosterFile: join(dir, 'players.csv'),
      resultsFile: join(dir, 'tournament.csv'),
      outputFile,
      changesFile,
      mode: 'strict',
      diagnostics,
    });

    assert.deepEqual(
      run.writes.map((write) => [write.path, write.ok]),
      [
        [outputFile, false],
        [changesFile, true],
      ]
    );
    const [failure] = diagnostics.byCode('output_write_failure');
    assert.equal(failure.path, outputFile);

    // the computed tables can be written again without recomputing
    const retryPath = join(dir, 'retry.csv');
    const retried = await writeReports([{ path: retryPath, table: run.reports[0].table }], diagnostics);
    assert.equal(retried[0].ok, true);
    assert.match(await readFile(retryPath, 'utf8'), /^ID\tName\tRating\tRD\tRV\n1\tAlice\t1579\t/);
  });

  it('skips the changes table when no path is given', async () => {
    const run = await runTournament({
      rosterFile: join(dir, 'players.csv'),
      resultsFile: join(dir, 'tournament.csv'),
      outputFile: join(dir, 'only.csv'),
      mode: 'lenient',
    });

    assert.equal(run.reports.length, 1);
    assert.equal(run.writes.length, 1);
  });
});
