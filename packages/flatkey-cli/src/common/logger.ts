/**
 * Debug logger setup for flatkey-cli.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'flatkey-cli';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'cli', 'config')
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

export const cliLog = createLogger('cli');
export const configLog = createLogger('config');
