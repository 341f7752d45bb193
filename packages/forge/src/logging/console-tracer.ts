import type { BuildEvent, BuildTrace } from '../types/types.js';

/**
 * Format a build event as a single log line.
 *
 * @example
 * formatBuildEvent({ path: 'optimizer', kind: 'callable', detail: 'calling Adam' })
 * // → 'instantiating "optimizer" calling Adam'
 */
export function formatBuildEvent(event: BuildEvent): string {
  return `instantiating "${event.path}" ${event.detail}`;
}

/**
 * Trace hook writing every build event through `console.info`.
 *
 * @param prefix - Prepended to each line
 */
export function consoleTracer(prefix = '[Kiln]'): BuildTrace {
  return (event) => {
    console.info(`${prefix} ${formatBuildEvent(event)}`);
  };
}
