/**
 * Docker Secrets Support (`_FILE` suffix pattern)
 *
 * Resolves environment variables with support for Docker secrets.
 * When `ENV_NAME_FILE` is set, reads the file contents instead of `ENV_NAME`.
 * `_FILE` variant takes precedence over plain env var.
 */

import { readFileSync } from 'node:fs';

/**
 * Resolve a secret from environment variables with `_FILE` suffix support.
 *
 * @param name - Environment variable name (e.g., 'RQC_BRIDGE_HOST_TOKEN')
 * @param env - Environment to read from (defaults to process.env)
 * @returns The resolved value, or undefined if neither is set
 * @throws Error if `_FILE` is set but the file cannot be read
 */
export function resolveSecret(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const filePath = env[`${name}_FILE`];

  if (filePath) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(
        `Failed to read secret file for ${name}_FILE (${filePath}): ${message}`
      );
    }
  }

  return env[name];
}
