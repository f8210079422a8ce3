import { z } from 'zod';
import { ConfigError } from '../strength/config.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

const schema = z.object({
  PWCHECK_CONFIG: z.string().min(1).optional(),
  PWCHECK_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type CheckerEnv = z.infer<typeof schema>;

export function readCheckerEnv(env: NodeJS.ProcessEnv): CheckerEnv {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.some(level => level === value);
}
