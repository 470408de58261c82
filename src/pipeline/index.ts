/**
 * Pipeline Integration
 *
 * Entry point for the orchestration engine: run ordered stages once,
 * produce a report, hand it to the notifier.
 */

import * as Orchestrator from './orchestrator';

export type PipelineOrchestrator = Orchestrator.OrchestratorInstance;
export type { OrchestratorConfig } from './orchestrator';

export const create = Orchestrator.create;
export const assertUniqueStageIds = Orchestrator.assertUniqueStageIds;

export * as Report from './report';
export * as Window from './window';
export * from './types';
