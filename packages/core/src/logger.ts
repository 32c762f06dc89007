// packages/core/src/logger.ts

export type DebugLogger = ((event: string, payload?: Record<string, unknown>) => void) & {
  readonly enabled: boolean;
};

function debugEnabled(env: NodeJS.ProcessEnv): boolean {
  return env.MLTRIAGE_DEBUG === '1' || String(env.DEBUG || '').toLowerCase().includes('mltriage');
}

function debugLimit(env: NodeJS.ProcessEnv): number {
  const n = Number.parseInt(String(env.MLTRIAGE_DEBUG_LIMIT ?? '200'), 10);
  return Number.isFinite(n) && n > 0 ? n : 200;
}

/**
 * Env-gated stderr logger: `[mltriage:<namespace>] <event> <json>`.
 * Enabled with MLTRIAGE_DEBUG=1 or DEBUG=mltriage.
 */
export function createDebugLogger(namespace: string, env: NodeJS.ProcessEnv = process.env): DebugLogger {
  const enabled = debugEnabled(env);
  const limit = debugLimit(env);
  let count = 0;

  const log = (event: string, payload?: Record<string, unknown>) => {
    if (!enabled || count >= limit) return;
    count++;
    // Keep logs grep-friendly in CI
    const msg = payload ? `${event} ${JSON.stringify(payload)}` : event;
    console.error(`[mltriage:${namespace}] ${msg}`);
  };

  return Object.assign(log, { enabled });
}
