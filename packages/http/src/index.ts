// Fluent HTTP client with single-request retries and round-based batch execution
export * from './client.js';
export * from './request-builder.js';
export * from './batch-queue.js';
export * from './config.js';
export * from './types.js';

export * from './instrumentation.js';

export { SingleRequestExecutor } from './executors/single-request-executor.js';
export { BatchExecutor, DEFAULT_POLL_INTERVAL_MS } from './executors/batch-executor.js';
export { createDefaultEffects } from './executors/effects.js';
export type { AttemptContext, ExecutorDependencies } from './executors/perform-attempt.js';

export * from './transport/types.js';
export * from './transport/undici-transport.js';

// Export pure functional core functions
export * from './core/index.js';
