import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import OpenAI from 'openai';
import * as Summarize from '../../src/stages/summarize';
import * as Transcript from '../../src/transcript';
import * as Assistant from '../../src/assistant';
import * as Ledger from '../../src/ledger';
import * as Stage from '../../src/stage';
import { SUMMARY_THREAD_PURPOSE } from '../../src/constants';
import { context, window } from '../stage/helpers';
import { fakeAssistantApi } from '../assistant/fake';
import { makeTempDir } from './fixtures';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Summarize Stage', () => {
    let tempDir: string;
    let summaries: string;
    let transcripts: Transcript.TranscriptStore;
    let api: ReturnType<typeof fakeAssistantApi>;
    let ledger: Ledger.SessionLedger;
    let stage: Stage.StageExecutor;

    beforeEach(async () => {
        tempDir = await makeTempDir('summarize');
        summaries = path.join(tempDir, 'summaries');
        transcripts = Transcript.create({ directory: path.join(tempDir, 'transcripts') });
        api = fakeAssistantApi();
        const assistant = Assistant.create({ api, assistantId: 'asst-test', threadRetentionDays: 30 });
        ledger = Ledger.create({ store: Ledger.createMemoryStore(), factory: assistant });
        stage = Summarize.create({ summariesDirectory: summaries, transcripts, assistant, ledger });

        await transcripts.write({ source: 'evening.m4a', recordedAt: new Date('2026-10-19T21:40:00Z'), model: 'whisper-1', text: 'Called home.' });
        await transcripts.write({ source: 'morning.m4a', recordedAt: new Date('2026-10-19T08:15:00Z'), model: 'whisper-1', text: 'Walked the dog.' });
        await transcripts.write({ source: 'late.m4a', recordedAt: new Date('2026-10-18T22:00:00Z'), model: 'whisper-1', text: 'Could not sleep.' });
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should refuse to run without a session', async () => {
        const error = await stage.execute(context()).catch((e: unknown) => e);

        expect(Stage.describeError(error)).toBe('Summarizing needs an assistant thread');
        expect(Stage.classifyError(error)).toBe('permanent');
    });

    it('should skip a window without transcripts', async () => {
        const session = await ledger.acquireSession(SUMMARY_THREAD_PURPOSE);
        const empty = { start: new Date('2026-10-17T00:00:00Z'), end: new Date('2026-10-17T23:59:59.999Z') };

        expect(await stage.execute(context({ window: empty }), session)).toEqual({
            status: 'skipped',
            reason: 'nothing to do',
            detail: 'no transcripts for 2026-10-17',
        });
        expect(api.threads.messages.create).not.toHaveBeenCalled();
    });

    it('should post the entries and write the reply', async () => {
        const session = await ledger.acquireSession(SUMMARY_THREAD_PURPOSE);

        const result = await stage.execute(context(), session);

        const target = path.join(summaries, '2026-10-19.md');
        expect(result).toEqual({ status: 'succeeded', summary: `summarized 2 transcripts into ${target}` });
        expect(api.threads.messages.create).toHaveBeenCalledWith('thread-1', {
            role: 'user',
            content: 'Diary entries for 2026-10-19:\n\n[08:15] Walked the dog.\n\n[21:40] Called home.',
        });
        expect(await fs.readFile(target, 'utf8')).toBe('=== Diary Summary: 2026-10-19 ===\n\nA calm day.\n');
    });

    it('should not call the assistant on a dry run', async () => {
        const session = await ledger.acquireSession(SUMMARY_THREAD_PURPOSE);

        const result = await stage.execute(context({ dryRun: true }), session);

        expect(result).toEqual({ status: 'succeeded', summary: 'would summarize 2 transcripts for 2026-10-19' });
        expect(api.threads.messages.create).not.toHaveBeenCalled();
    });

    it('should report a dry run without a thread', async () => {
        const result = await stage.execute(context({ dryRun: true }));

        expect(result).toEqual({ status: 'succeeded', summary: 'would summarize 2 transcripts for 2026-10-19' });
        expect(api.threads.create).not.toHaveBeenCalled();
        expect(api.threads.messages.create).not.toHaveBeenCalled();
    });

    it('should drop a thread the provider no longer knows', async () => {
        const session = await ledger.acquireSession(SUMMARY_THREAD_PURPOSE);
        api.threads.messages.create.mockRejectedValueOnce(new OpenAI.NotFoundError(404, undefined, 'No thread found', undefined));

        const error = await stage.execute(context(), session).catch((e: unknown) => e);

        expect(Stage.classifyError(error)).toBe('permanent');
        expect(Stage.describeError(error)).toBe('Assistant thread thread-1 no longer exists; a new one is created on the next run');
        expect(await ledger.peekSession(SUMMARY_THREAD_PURPOSE)).toBeUndefined();
        expect((await ledger.acquireSession(SUMMARY_THREAD_PURPOSE)).id).toBe('thread-2');
    });

    it('should pass other assistant errors through', async () => {
        const session = await ledger.acquireSession(SUMMARY_THREAD_PURPOSE);
        api.threads.runs.createAndPoll.mockResolvedValueOnce({
            id: 'run-2',
            status: 'failed',
            last_error: { code: 'server_error', message: 'Try again' },
        });

        const error = await stage.execute(context(), session).catch((e: unknown) => e);

        expect(Stage.classifyError(error)).toBe('transient');
        expect(await ledger.peekSession(SUMMARY_THREAD_PURPOSE)).toEqual(session);
    });

    describe('formatEntries', () => {
        it('should include the date for windows over several days', async () => {
            const twoDays = { start: new Date('2026-10-18T00:00:00Z'), end: window.end };

            const entries = await transcripts.list(twoDays);

            expect(Summarize.formatEntries(entries, twoDays)).toBe([
                'Diary entries for 2026-10-18 to 2026-10-19:',
                '[2026-10-18 22:00] Could not sleep.',
                '[2026-10-19 08:15] Walked the dog.',
                '[2026-10-19 21:40] Called home.',
            ].join('\n\n'));
        });
    });

    describe('summaryPath', () => {
        it('should name multi-day summaries after both ends', () => {
            const twoDays = { start: new Date('2026-10-18T00:00:00Z'), end: window.end };

            expect(Summarize.summaryPath('/diary/summaries', twoDays)).toBe(path.join('/diary/summaries', '2026-10-18..2026-10-19.md'));
        });
    });
});
