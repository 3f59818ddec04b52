/**
 * Debug Logger
 *
 * Traces dispatches and tree traversal.
 * Enable via environment: BRANCHROUTE_DEBUG=true, or call debug.enable().
 */

export const DEBUG_ENV_KEY = 'BRANCHROUTE_DEBUG';
const PREFIX = '[branchroute]';

let enabled = typeof process !== 'undefined' && process.env[DEBUG_ENV_KEY] === 'true';

export const debug = {
  /** Enable debug logging for this process */
  enable(): void {
    enabled = true;
    console.log(`${PREFIX} Debug logging enabled`);
  },

  /** Disable debug logging */
  disable(): void {
    enabled = false;
  },

  isEnabled(): boolean {
    return enabled;
  },

  /** Log general information */
  info(category: string, message: string, data?: unknown): void {
    if (!enabled) return;
    const prefix = `${PREFIX} [${category}]`;
    if (data !== undefined) {
      console.log(prefix, message, data);
    } else {
      console.log(prefix, message);
    }
  },

  /** Log a dispatch outcome */
  dispatch(outcome: 'matched' | 'delegated' | 'failed', path: string, detail?: string): void {
    if (!enabled) return;
    const detailStr = detail ? ` (${detail})` : '';
    console.log(`${PREFIX} [dispatch] ${outcome}: ${path}${detailStr}`);
  },

  /** Log a single traversal step */
  step(from: string, segment: string, hit: boolean): void {
    if (!enabled) return;
    console.log(`${PREFIX} [step] ${from} → ${segment}${hit ? '' : ' (no match)'}`);
  },
};
