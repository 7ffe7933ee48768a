import { FlowRelayError } from '@flowrelay/core';
import type { DirectoryClientOptions } from './client';
import { validateDirectoryEnv } from './schema';

export type DirectoryEnvConfig = Pick<DirectoryClientOptions, 'baseUrl' | 'timeoutMs'>;

/**
 * Read the client's connection settings from the environment.
 *
 * - `FLOWRELAY_BASE_URL`: required, http(s) URL
 * - `FLOWRELAY_TIMEOUT_MS`: optional positive integer
 */
export function directoryConfigFromEnv(env: Readonly<Record<string, string | undefined>> = process.env): DirectoryEnvConfig {
  const candidate = {
    FLOWRELAY_BASE_URL: env.FLOWRELAY_BASE_URL,
    FLOWRELAY_TIMEOUT_MS: env.FLOWRELAY_TIMEOUT_MS,
  };

  if (!validateDirectoryEnv(candidate)) {
    const error = validateDirectoryEnv.errors?.[0];
    const variable = error?.instancePath.replace(/^\//, '') || String(error?.params.missingProperty ?? 'environment');
    throw new FlowRelayError('CONFIG_INVALID', `Invalid ${variable}: ${error?.message ?? 'is invalid'}`);
  }

  const config: DirectoryEnvConfig = { baseUrl: candidate.FLOWRELAY_BASE_URL };
  if (candidate.FLOWRELAY_TIMEOUT_MS !== undefined) {
    config.timeoutMs = Number(candidate.FLOWRELAY_TIMEOUT_MS);
  }
  return config;
}
