/**
 * Pipelines
 *
 * ingest: acquire new recordings, then transcribe the inbox.
 * digest: summarize the work window, then mail the summary.
 */

import * as Stage from '../stage';
import * as Window from '../pipeline/window';
import * as Acquire from './acquire';
import * as Transcribe from './transcribe';
import * as Summarize from './summarize';
import * as Email from './email';
import { SUMMARY_THREAD_PURPOSE } from '../constants';

export interface IngestDependencies {
    acquire: Acquire.AcquireConfig;
    transcribe: Transcribe.TranscribeConfig;
}

export interface DigestDependencies {
    summarize: Summarize.SummarizeConfig;
    email: Email.EmailConfig;
}

export const ingest = (deps: IngestDependencies): Stage.StageDefinition[] => [
    {
        id: 'acquire',
        executor: Acquire.create(deps.acquire),
        // Recordings already in the inbox are transcribed even when the source is unreachable
        isolation: true,
        requiresSession: false,
    },
    {
        id: 'transcribe',
        executor: Transcribe.create(deps.transcribe),
        isolation: false,
        requiresSession: false,
    },
];

export const digest = (deps: DigestDependencies): Stage.StageDefinition[] => [
    {
        id: 'summarize',
        executor: Summarize.create(deps.summarize),
        isolation: false,
        requiresSession: true,
        sessionPurpose: SUMMARY_THREAD_PURPOSE,
        guardKey: (window) => Window.windowKey('summary', window),
    },
    {
        id: 'email',
        executor: Email.create(deps.email),
        isolation: false,
        requiresSession: false,
        guardKey: (window) => Window.windowKey('email', window),
    },
];

export { summaryPath, summaryHeader, formatEntries } from './summarize';
export { subjectFor } from './email';
export { processedDirectoryFor, FAILED_DIRECTORY_NAME } from './transcribe';
export type { AcquireConfig } from './acquire';
export type { TranscribeConfig } from './transcribe';
export type { SummarizeConfig } from './summarize';
export type { EmailConfig } from './email';
