/**
 * AdFeed — Environment
 *
 * Process-level settings that live outside the config document.
 * dotenv populates process.env before this is read.
 */

import { z } from 'zod';

const EnvSchema = z.object({
  CONFIG_FILE: z.string().min(1).default('config.json'),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
});

export type RuntimeEnv = z.infer<typeof EnvSchema>;

export function loadEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  return result.data;
}
