export type Effect<Env, A> = (env: Env, signal: AbortSignal) => Promise<A>;

export type RunHandle<A> = {
  promise: Promise<A>;
  cancel: () => void;
};

export type Runtime<Env> = {
  env: Env;
  run: <A>(effect: Effect<Env, A>) => RunHandle<A>;
};

export type Clock = {
  nowMs: () => number;
  nowIso: () => string;
};

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class CancelledError extends Error {
  constructor() {
    super("Cancelled");
    this.name = "CancelledError";
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(id);
      reject(new CancelledError());
    };
    const id = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const Effect = {
  sleep<Env>(ms: number): Effect<Env, void> {
    return (_env, signal) => sleep(ms, signal);
  },
  retry<Env, A>(
    effect: Effect<Env, A>,
    options: { retries: number; delayMs?: number }
  ): Effect<Env, A> {
    const { retries, delayMs = 0 } = options;
    return async (env, signal) => {
      let attempt = 0;
      while (!signal.aborted) {
        try {
          return await effect(env, signal);
        } catch (err) {
          if (attempt >= retries) throw err;
          attempt += 1;
          if (delayMs > 0) {
            await Effect.sleep<Env>(delayMs)(env, signal);
          }
        }
      }
      throw new CancelledError();
    };
  }
};

export function createRuntime<Env>(env: Env): Runtime<Env> {
  return {
    env,
    run<A>(effect: Effect<Env, A>): RunHandle<A> {
      const controller = new AbortController();
      const promise = effect(env, controller.signal);
      return {
        promise,
        cancel: () => controller.abort()
      };
    }
  };
}

export function createClock(): Clock {
  return {
    nowMs: () => Date.now(),
    nowIso: () => new Date().toISOString()
  };
}

export function createLogger(service = "ordergate", level: LogLevel = "info", clock: Clock = createClock()): Logger {
  const enabled = (msgLevel: LogLevel) => LOG_LEVELS[msgLevel] >= LOG_LEVELS[level];
  const prefix = (msgLevel: LogLevel) => `[${clock.nowIso()}] [${service}] [${msgLevel.toUpperCase()}]`;
  return {
    debug: (message, meta) => { if (enabled("debug")) console.debug(`${prefix("debug")} ${message}`, meta ?? ""); },
    info: (message, meta) => { if (enabled("info")) console.log(`${prefix("info")} ${message}`, meta ?? ""); },
    warn: (message, meta) => { if (enabled("warn")) console.warn(`${prefix("warn")} ${message}`, meta ?? ""); },
    error: (message, meta) => { if (enabled("error")) console.error(`${prefix("error")} ${message}`, meta ?? ""); }
  };
}

export function createSilentLogger(): Logger {
  const noop = () => undefined;
  return { debug: noop, info: noop, warn: noop, error: noop };
}
