// config.ts
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const ConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  host: z.string().min(1).default('0.0.0.0'),
  allowedOrigins: z.string().min(1).default('*'),
});

export type Config = z.infer<typeof ConfigSchema>;

const ENV_NAMES = new Map<string, string>([
  ['env', 'NODE_ENV'],
  ['port', 'PORT'],
  ['host', 'HOST'],
  ['allowedOrigins', 'ALLOWED_ORIGINS'],
]);

type Environment = Record<string, string | undefined>;

// Blank variables count as unset so that `PORT=` in a .env file keeps the default
function readVar(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Builds the service configuration from environment variables.
 * LOG_LEVEL is read by the logger itself.
 * Throws with the offending variable named when a value does not validate.
 */
export function loadConfig(env: Environment = process.env): Config {
  const raw = {
    env: readVar(env, 'NODE_ENV'),
    port: readVar(env, 'PORT'),
    host: readVar(env, 'HOST'),
    allowedOrigins: readVar(env, 'ALLOWED_ORIGINS'),
  };

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(issue => {
      const key = String(issue.path[0]);
      return `${ENV_NAMES.get(key) ?? key}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration. ${problems.join('; ')}`);
  }
  return result.data;
}
