import 'dotenv/config';
import { z } from 'zod';

export interface AppConfig {
  output: {
    dir: string;
    prefix: string;
    unmatchedPrefix?: string;
  };
  quiet: boolean;
}

// Empty strings count as unset
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  CSV_GROUPER_OUTPUT_DIR: optionalText,
  CSV_GROUPER_OUTPUT_PREFIX: optionalText,
  CSV_GROUPER_UNMATCHED_PREFIX: optionalText,
  CSV_GROUPER_QUIET: z
    .enum(['true', 'false', '1', '0'], {
      errorMap: () => ({ message: 'must be one of true, false, 1, 0' })
    })
    .optional()
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  const vars = parsed.data;
  return {
    output: {
      dir: vars.CSV_GROUPER_OUTPUT_DIR ?? './output',
      prefix: vars.CSV_GROUPER_OUTPUT_PREFIX ?? 'grouped',
      unmatchedPrefix: vars.CSV_GROUPER_UNMATCHED_PREFIX
    },
    quiet: vars.CSV_GROUPER_QUIET === 'true' || vars.CSV_GROUPER_QUIET === '1'
  };
}
