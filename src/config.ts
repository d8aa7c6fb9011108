import { z } from 'zod';
import { ConfigError } from './lib/errors.js';

/** Runtime settings read from the environment. */
export interface Config {
  /** Directory holding the `.out` folder. */
  root: string;
  /** Fixed `YYYY-MM-DD HH:mm` used instead of the wall clock. */
  mockTime?: string;
  /** Answer yes to every confirmation. */
  skipPrompts: boolean;
  /** Overrides the daily-report location. */
  reportFile?: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const EnvSchema = z.object({
  WT_ROOT: optionalString,
  WT_MOCK_TIME: optionalString,
  WT_SKIP_PROMPTS: optionalString,
  WT_REPORT_FILE: optionalString,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.parse(env);
  if (parsed.WT_ROOT === undefined) {
    throw new ConfigError('Env $WT_ROOT not set.');
  }
  return {
    root: parsed.WT_ROOT,
    mockTime: parsed.WT_MOCK_TIME,
    skipPrompts: parsed.WT_SKIP_PROMPTS !== undefined,
    reportFile: parsed.WT_REPORT_FILE,
  };
}
