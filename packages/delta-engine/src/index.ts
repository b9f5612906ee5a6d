export { DeltaRunner } from './runner.js';
export type { DeltaPorts, DeltaRunnerOptions, RunnerRetryOptions } from './runner.js';
export { Orchestrator, buildReport } from './dispatch.js';
export type { OrchestratorOptions, RunCycleOptions } from './dispatch.js';
export { raceAbort, acquireSemaphoreAbortable, createTableSignal } from './abort.js';
export type { TableSignal } from './abort.js';
export { InMemoryWatermarkStore, InMemorySink, InMemoryExtractionSource } from './memory.js';
export type { StoredBatch, InMemoryPortOptions } from './memory.js';
