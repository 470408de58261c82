import { describe, it, expect, vi } from 'vitest';
import * as Stages from '../../src/stages';
import * as Transcript from '../../src/transcript';
import * as Assistant from '../../src/assistant';
import * as Ledger from '../../src/ledger';
import { window } from '../stage/helpers';
import { fakeAssistantApi } from '../assistant/fake';
import { fakeTranscription } from './fixtures';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Pipelines', () => {
    const transcripts = Transcript.create({ directory: '/diary/transcripts' });

    it('should acquire before transcribing and keep going when acquiring fails', () => {
        const stages = Stages.ingest({
            acquire: { inboxDirectory: '/diary/inbox', extensions: ['m4a'] },
            transcribe: {
                inboxDirectory: '/diary/inbox',
                processedDirectory: '/diary/processed',
                extensions: ['m4a'],
                transcripts,
                transcription: fakeTranscription(),
            },
        });

        expect(stages.map(stage => [stage.id, stage.isolation, stage.requiresSession])).toEqual([
            ['acquire', true, false],
            ['transcribe', false, false],
        ]);
        expect(stages.every(stage => stage.guardKey === undefined)).toBe(true);
    });

    it('should guard summary and mail once per window', () => {
        const assistant = Assistant.create({ api: fakeAssistantApi(), threadRetentionDays: 30 });
        const stages = Stages.digest({
            summarize: {
                summariesDirectory: '/diary/summaries',
                transcripts,
                assistant,
                ledger: Ledger.create({ store: Ledger.createMemoryStore(), factory: assistant }),
            },
            email: { summariesDirectory: '/diary/summaries', subjectPrefix: 'Voice Diary' },
        });

        const [summarize, email] = stages;
        expect(stages.map(stage => stage.id)).toEqual(['summarize', 'email']);
        expect(summarize.requiresSession).toBe(true);
        expect(summarize.sessionPurpose).toBe('summary-thread');
        expect(summarize.guardKey?.(window)).toBe('summary:2026-10-19');
        expect(email.requiresSession).toBe(false);
        expect(email.guardKey?.(window)).toBe('email:2026-10-19');
    });
});
