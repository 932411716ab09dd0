import { z } from 'zod';

import { P } from './engine/params.js';

const EnvSchema = z.object({
  RATING_ROSTER_FILE: z.string().min(1).default('players.csv'),
  RATING_RESULTS_FILE: z.string().min(1).default('tournament.csv'),
  RATING_OUTPUT_FILE: z.string().min(1).default('output.csv'),
  // empty disables the changes table
  RATING_CHANGES_FILE: z.string().default('changed_players.csv'),
  RATING_LOAD_MODE: z.enum(['strict', 'lenient']).default('strict'),
  GLICKO_TAU: z.coerce.number().positive().default(P.glicko.tau),
});

export interface RatingConfig {
  rosterFile: string;
  resultsFile: string;
  outputFile: string;
  changesFile?: string;
  mode: 'strict' | 'lenient';
  tau: number;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: z.ZodIssue[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ConfigOverrides = Partial<RatingConfig>;

const ENV_KEYS = [
  ['rosterFile', 'RATING_ROSTER_FILE'],
  ['resultsFile', 'RATING_RESULTS_FILE'],
  ['outputFile', 'RATING_OUTPUT_FILE'],
  ['changesFile', 'RATING_CHANGES_FILE'],
  ['mode', 'RATING_LOAD_MODE'],
  ['tau', 'GLICKO_TAU'],
] as const satisfies ReadonlyArray<readonly [keyof RatingConfig, keyof z.input<typeof EnvSchema>]>;

/**
 * Reads the configuration from the environment. Values given in `overrides`
 * (usually command-line flags) win, and the environment variable they replace
 * is not validated. An explicit `changesFile: undefined` disables the changes
 * table.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): RatingConfig {
  const effective: NodeJS.ProcessEnv = { ...env };
  for (const [key, envKey] of ENV_KEYS) {
    const given = key === 'changesFile' ? key in overrides : overrides[key] !== undefined;
    if (given) delete effective[envKey];
  }

  const parsed = EnvSchema.safeParse(effective);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid rating configuration: ${detail}`, parsed.error.issues);
  }
  const vars = parsed.data;
  return {
    rosterFile: overrides.rosterFile ?? vars.RATING_ROSTER_FILE,
    resultsFile: overrides.resultsFile ?? vars.RATING_RESULTS_FILE,
    outputFile: overrides.outputFile ?? vars.RATING_OUTPUT_FILE,
    changesFile: 'changesFile' in overrides ? overrides.changesFile || undefined : vars.RATING_CHANGES_FILE || undefined,
    mode: overrides.mode ?? vars.RATING_LOAD_MODE,
    tau: overrides.tau ?? vars.GLICKO_TAU,
  };
}
