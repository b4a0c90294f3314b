import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { errorMessage } from './errors.js';

/**
 * Directory where container secrets are mounted, one file per secret.
 */
export const DEFAULT_SECRETS_DIR = process.env.SECRETS_DIR || '/run/secrets';

/**
 * Resolve a secret from `<dir>/<name>`, falling back to an environment
 * variable. A mounted file wins over the environment. Returns undefined
 * when neither is set; throws when the file exists but cannot be read and
 * the environment has no value either.
 */
export function readSecret(
  name: string,
  envVar: string,
  options: { dir?: string; env?: NodeJS.ProcessEnv } = {}
): string | undefined {
  const path = join(options.dir ?? DEFAULT_SECRETS_DIR, name);
  const fromEnv = (options.env ?? process.env)[envVar] || undefined;

  if (!existsSync(path)) return fromEnv;

  try {
    return readFileSync(path, 'utf8').trim();
  } catch (error) {
    if (fromEnv !== undefined) return fromEnv;
    throw new Error(`Secret "${name}" is mounted at ${path} but unreadable: ${errorMessage(error)}`);
  }
}
