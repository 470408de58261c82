/**
 * Stage System
 *
 * Stage contract, result helpers, error classification and the retrying
 * runner.
 */

import * as Runner from './runner';

export type StageRunner = Runner.RunnerInstance;
export type { RunnerConfig, Sleep } from './runner';

export const create = Runner.create;
export const defaultSleep = Runner.defaultSleep;

export * from './types';
export * from './errors';
