export * from './branded.js';
export * from './types.js';
export * from './diagnostics.js';
export * from './runtime-error.js';
export * from './logger.js';
export * from './detector.js';
export * from './progress-listener.js';
export * from './yield-point.js';
export * from './detect-condition.js';
export * from './verify-conditions.js';
export * from './end-condition-verifier.js';
export * from './scenario-state.js';
export * from './prng.js';
export * from './action-randomizer.js';
export * from './action-executor.js';
export * from './schemas.js';
export * from './load-scenario.js';
export * from './debug-report.js';
export * from './scenario-processor.js';
