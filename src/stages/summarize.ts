/**
 * Summarize Stage
 *
 * Posts the window's transcripts to the assistant thread held by the ledger
 * and writes the reply to `summaries/<window>.md`.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Stage from '../stage';
import * as Window from '../pipeline/window';
import * as Assistant from '../assistant';
import type { SessionLedger } from '../ledger';
import type { SessionHandle } from '../ledger/types';
import type { Transcript, TranscriptStore } from '../transcript';
import { plural } from './audio';

export interface SummarizeConfig {
    summariesDirectory: string;
    transcripts: TranscriptStore;
    assistant: Assistant.AssistantClient;
    ledger: SessionLedger;
}

export const summaryPath = (summariesDirectory: string, window: Stage.WorkWindow): string =>
    path.join(summariesDirectory, `${Window.label(window)}.md`);

export const summaryHeader = (window: Stage.WorkWindow): string =>
    `=== Diary Summary: ${Window.describeWindow(window)} ===`;

const pad = (n: number) => n.toString().padStart(2, '0');

/** One block per entry, prefixed with its recording time */
export const formatEntries = (transcripts: Transcript[], window: Stage.WorkWindow): string => {
    const singleDay = Window.isSingleDay(window);
    const blocks = transcripts.map(transcript => {
        const at = transcript.recordedAt;
        const time = `${pad(at.getHours())}:${pad(at.getMinutes())}`;
        const stamp = singleDay ? time : `${Window.formatDate(at)} ${time}`;
        return `[${stamp}] ${transcript.text}`;
    });
    return [`Diary entries for ${Window.describeWindow(window)}:`, ...blocks].join('\n\n');
};

export const create = (config: SummarizeConfig): Stage.StageExecutor => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const ask = async (session: SessionHandle, content: string): Promise<string> => {
        try {
            return await config.assistant.summarize(session.id, content);
        } catch (error) {
            if (Assistant.isThreadMissing(error)) {
                await config.ledger.invalidateSession(session.purpose);
                throw Stage.permanent(`Assistant thread ${session.id} no longer exists; a new one is created on the next run`, error);
            }
            throw error;
        }
    };

    const execute = async (ctx: Stage.RunContext, session?: SessionHandle): Promise<Stage.StageResult> => {
        const transcripts = await config.transcripts.list(ctx.window);
        const description = Window.describeWindow(ctx.window);
        if (transcripts.length === 0) {
            return Stage.skipped('nothing to do', `no transcripts for ${description}`);
        }
        if (ctx.dryRun) {
            return Stage.succeeded(`would summarize ${plural(transcripts.length, 'transcript')} for ${description}`);
        }
        if (!session) {
            throw Stage.permanent('Summarizing needs an assistant thread');
        }

        logger.info('Summarizing %s for %s', plural(transcripts.length, 'transcript'), description);
        const summary = await ask(session, formatEntries(transcripts, ctx.window));

        const target = summaryPath(config.summariesDirectory, ctx.window);
        await storage.createDirectory(config.summariesDirectory);
        await storage.writeFile(target, `${summaryHeader(ctx.window)}\n\n${summary}\n`, 'utf8');

        return Stage.succeeded(`summarized ${plural(transcripts.length, 'transcript')} into ${target}`);
    };

    return {
        execute,
        classify: Stage.classifyError,
    };
};
