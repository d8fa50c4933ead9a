export * from './kernel/index.js';
export * from './sim/scenario-runner.js';
