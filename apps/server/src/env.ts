import dotenv from 'dotenv';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  // Shared secret for the HS256 access tokens presented in HELLO
  TABLE_JWT_SECRET: z.string().min(16),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate configuration, by default from process.env after loading .env.
 * Throws with every problem listed when something is missing or malformed.
 */
export function loadEnv(source?: Record<string, string | undefined>): Env {
  if (!source) {
    dotenv.config();
  }
  const result = EnvSchema.safeParse(source ?? process.env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}
