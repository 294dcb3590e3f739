/**
 * @fileoverview Client configuration loading from YAML.
 * Validates and caches configuration for connecting an environment.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

// Schema for client configuration
const ClientConfigSchema = z.object({
  server: z.object({
    url: z.string().url(),
  }),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
  globals: z
    .record(
      z.string().min(1),
      z.object({
        maxVersion: z.number().int().positive(),
      })
    )
    .default({}),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

let cachedConfig: ClientConfig | null = null;

/**
 * Validate an already-parsed configuration object.
 * @throws {ConfigError} if it does not match the schema
 */
export function parseClientConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(details);
  }
  return result.data;
}

/**
 * Load and validate client configuration from a YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the given path, if any
 * - GLOBAL_ENV_CONFIG environment variable if set
 * - Otherwise from ./config/client.yaml relative to cwd
 */
export function loadClientConfig(path?: string): ClientConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath =
    path ?? process.env['GLOBAL_ENV_CONFIG'] ?? join(process.cwd(), 'config/client.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const validatedConfig = parseClientConfig(parseYaml(fileContents));
  cachedConfig = validatedConfig;
  return validatedConfig;
}

/**
 * Clear the cached config (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Per-interface version caps in the form the environment takes.
 */
export function versionCapsOf(config: ClientConfig): Record<string, number> {
  const caps: Record<string, number> = {};
  for (const [name, settings] of Object.entries(config.globals)) {
    caps[name] = settings.maxVersion;
  }
  return caps;
}
