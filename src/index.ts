/**
 * Dagbok Public API
 *
 * The scheduling and orchestration engine behind the CLI: stages with retry,
 * the session ledger, the orchestrator and the scheduler. The voice diary
 * pipelines are built from these in `Stages`.
 *
 * For CLI usage run the `dagbok` binary.
 */

export * as Retry from './retry';
export * as Stage from './stage';
export * as Ledger from './ledger';
export * as Pipeline from './pipeline';
export * as Scheduler from './scheduler';
export * as Stages from './stages';
export * as Transcription from './transcription';
export * as Transcript from './transcript';
export * as Assistant from './assistant';
export * as Notify from './notify';
export * as Config from './config';

export { assemble } from './dagbok';
export type { Application, AssembleOptions } from './dagbok';
export { getLogger, setLogLevel } from './logging';
export type { LogLevel } from './logging';
export { VERSION, PROGRAM_NAME } from './constants';
