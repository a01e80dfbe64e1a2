import type { NemligSession } from './types.js';

/**
 * Log a debug message if debug mode is enabled in the session.
 *
 * Writes to stderr so command output on stdout stays clean.
 *
 * @param session - Current Nemlig session
 * @param label - Label for the log (e.g., request method and URL)
 * @param data - Data to log (will be stringified)
 */
export function logDebug(session: NemligSession, label: string, data: unknown): void {
  if (session.debug) {
    const output = typeof data === 'string' ? data : JSON.stringify(data);
    console.error(`DEBUG: ${label}: ${output}`);
  }
}

/**
 * Log a progress message unless the session is quiet.
 */
export function logInfo(session: NemligSession, message: string): void {
  if (!session.quiet) {
    console.error(`[nemlig] ${message}`);
  }
}
