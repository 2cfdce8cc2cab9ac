/**
 * @module @pkbridge/backend/config
 *
 * Backend settings, read from the `[pkbridge]` group of the daemon key file
 * with `PKBRIDGE_*` environment overrides.
 *
 * ```ini
 * [pkbridge]
 * ScriptsDir=/usr/lib/pkbridge/scripts
 * ModuleName=pkbridge
 * CallTimeoutMs=60000
 * ```
 */

import { z } from 'zod';
import { ConfigError } from '@pkbridge/backend-contracts';
import type { KeyFile } from '@pkbridge/backend-contracts';

export const CONFIG_GROUP = 'pkbridge';

export const backendConfigSchema = z.object({
  scriptsDir: z.string().min(1),
  moduleName: z
    .string()
    .regex(/^[a-z][a-z0-9_-]*$/, 'must be lower case letters, digits, - or _')
    .default('pkbridge'),
  callTimeoutMs: z.coerce.number().int().positive().default(60_000),
});

export type BackendConfig = z.output<typeof backendConfigSchema>;

const SOURCES = [
  { field: 'scriptsDir', key: 'ScriptsDir', env: 'PKBRIDGE_SCRIPTS_DIR' },
  { field: 'moduleName', key: 'ModuleName', env: 'PKBRIDGE_MODULE_NAME' },
  { field: 'callTimeoutMs', key: 'CallTimeoutMs', env: 'PKBRIDGE_CALL_TIMEOUT_MS' },
] as const;

/**
 * Resolve backend settings. Environment values win over the key file.
 *
 * @throws ConfigError when a value is missing or invalid
 */
export function loadBackendConfig(keyFile: KeyFile, env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const raw: Record<string, string | undefined> = {};
  for (const source of SOURCES) {
    raw[source.field] = env[source.env] ?? keyFile.getString(CONFIG_GROUP, source.key);
  }

  const parsed = backendConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const field = String(issue.path[0]);
      const key = SOURCES.find((source) => source.field === field)?.key ?? field;
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid [${CONFIG_GROUP}] configuration: ${problems.join('; ')}`, {
      problems,
    });
  }
  return parsed.data;
}
