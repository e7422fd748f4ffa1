// Side effects of the executors, injectable for tests

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface HttpEffects {
  /** Resolves after `ms`, or as soon as `signal` aborts. */
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  log: (level: LogLevel, message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
