/**
 * Environment Configuration
 *
 * Loads and validates environment variables for the identity service.
 */

import { fileURLToPath } from 'node:url';
import { CommonEnvSchemas, parseEnv, z } from '@castellan/config';

const configFile = (name: string) => fileURLToPath(new URL(`../config/${name}`, import.meta.url));

const envSchema = z.object({
	// Server
	PORT: CommonEnvSchemas.port,
	HOST: z.string().default('0.0.0.0'),
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,

	// Tenant this process serves
	INSTANCE_ID: z.string().min(1).default('default'),

	// Persistence
	PERSISTENCE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
	DATABASE_URL: z.string().optional(),
	DATABASE_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.prefault('10'),
	CHANGE_FEED_POLL_INTERVAL_MS: CommonEnvSchemas.durationMs.prefault('250'),

	// Reads waiting for a known sequence give up after this long
	CONSISTENCY_TIMEOUT_MS: CommonEnvSchemas.durationMs.prefault('60000'),
	// Deadline for requests without an x-request-timeout-ms header
	REQUEST_TIMEOUT_MS: CommonEnvSchemas.durationMs.optional(),

	// Embedded mode: callers, resource directory and providers from JSON files
	CALLERS_FILE: z.string().default(configFile('callers.json')),
	RESOURCES_FILE: z.string().default(configFile('resources.json')),
	PROVIDERS_FILE: z.string().default(configFile('providers.json')),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Get validated environment configuration.
 *
 * @throws Error if the environment is invalid, or postgres is selected
 *   without a DATABASE_URL
 */
export function getEnv(): Env {
	if (!cachedEnv) {
		const env = parseEnv(envSchema);
		if (env.PERSISTENCE_DRIVER === 'postgres' && !env.DATABASE_URL) {
			throw new Error('Environment validation failed:\n  DATABASE_URL: required when PERSISTENCE_DRIVER=postgres');
		}
		cachedEnv = env;
	}
	return cachedEnv;
}
