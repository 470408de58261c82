import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import * as Email from '../../src/stages/email';
import type { MailerInstance } from '../../src/notify';
import { context } from '../stage/helpers';
import { makeTempDir } from './fixtures';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Email Stage', () => {
    let tempDir: string;
    let mailer: { send: Mock<MailerInstance['send']> };

    beforeEach(async () => {
        tempDir = await makeTempDir('email');
        mailer = { send: vi.fn<MailerInstance['send']>(async () => undefined) };
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    const writeSummary = async (text: string) => {
        await fs.writeFile(path.join(tempDir, '2026-10-19.md'), text, 'utf8');
    };

    it('should skip when mail is disabled', async () => {
        await writeSummary('A calm day.');
        const stage = Email.create({ summariesDirectory: tempDir, subjectPrefix: 'Voice Diary' });

        expect(await stage.execute(context())).toEqual({
            status: 'skipped',
            reason: 'nothing to do',
            detail: 'mail is disabled',
        });
    });

    it('should skip when there is no summary', async () => {
        const stage = Email.create({ summariesDirectory: path.join(tempDir, 'missing'), mailer, subjectPrefix: 'Voice Diary' });

        expect(await stage.execute(context())).toEqual({
            status: 'skipped',
            reason: 'nothing to do',
            detail: 'no summary for 2026-10-19',
        });
        expect(mailer.send).not.toHaveBeenCalled();
    });

    it('should mail the summary', async () => {
        await writeSummary('=== Diary Summary: 2026-10-19 ===\n\nA calm day.\n');
        const stage = Email.create({ summariesDirectory: tempDir, mailer, subjectPrefix: 'Voice Diary' });

        const result = await stage.execute(context());

        expect(result).toEqual({ status: 'succeeded', summary: 'mailed the summary for 2026-10-19' });
        expect(mailer.send).toHaveBeenCalledWith({
            subject: 'Voice Diary Summary for 2026-10-19',
            text: '=== Diary Summary: 2026-10-19 ===\n\nA calm day.\n',
        });
    });

    it('should not send on a dry run', async () => {
        await writeSummary('A calm day.');
        const stage = Email.create({ summariesDirectory: tempDir, mailer, subjectPrefix: 'Voice Diary' });

        const result = await stage.execute(context({ dryRun: true }));

        expect(result).toEqual({ status: 'succeeded', summary: 'would mail the summary for 2026-10-19' });
        expect(mailer.send).not.toHaveBeenCalled();
    });

    it('should pass delivery errors through', async () => {
        await writeSummary('A calm day.');
        mailer.send.mockRejectedValueOnce(new Error('connection refused'));
        const stage = Email.create({ summariesDirectory: tempDir, mailer, subjectPrefix: 'Voice Diary' });

        await expect(stage.execute(context())).rejects.toThrow('connection refused');
    });
});
