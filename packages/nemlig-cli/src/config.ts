import { getCredentialsFromEnv, type NemligCredentials } from 'nemlig-client';
import { UsageError, type GlobalOptions } from './args.js';

export interface CliConfig {
  credentials: NemligCredentials;
  debug: boolean;
}

function envFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Resolve credentials and switches from flags, falling back to the environment
 * (NEMLIG_USER, NEMLIG_PASS, NEMLIG_DEBUG). Flags win.
 *
 * @throws UsageError if username or password is missing from both
 */
export function resolveConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const credentials = getCredentialsFromEnv(env, { username: options.username, password: options.password });
  if (!credentials) {
    throw new UsageError('Credentials required. Pass --username and --password or set NEMLIG_USER and NEMLIG_PASS.');
  }

  return {
    credentials,
    debug: options.debug || envFlag(env.NEMLIG_DEBUG),
  };
}
