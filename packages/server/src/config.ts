import { z } from 'zod';

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_PATH: z.string().min(1).default('./data/showdesk.db'),
  CORS_ORIGIN: z.string().min(1).default('*'),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export interface Config {
  port: number;
  databasePath: string;
  corsOrigin: string;
  nodeEnv: 'development' | 'test' | 'production';
}

/**
 * Read configuration from an environment map. Throws with the offending
 * variable names when anything fails to parse.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return {
    port: result.data.PORT,
    databasePath: result.data.DATABASE_PATH,
    corsOrigin: result.data.CORS_ORIGIN,
    nodeEnv: result.data.NODE_ENV,
  };
}

let config: Config | null = null;

export function getConfig(): Config {
  if (config === null) {
    config = loadConfig();
  }
  return config;
}
