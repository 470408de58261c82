/**
 * Transcribe Stage
 *
 * Transcribes every recording in the inbox, files the transcript and moves
 * the audio into `processed/YYYY/MM/`. Once moved, a recording is never
 * transcribed again, so a retry only picks up what is left.
 *
 * A recording that fails permanently (too large, rejected by the API) is
 * moved to `inbox/failed/` so it does not fail every following run.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Stage from '../stage';
import type { TranscriptStore } from '../transcript';
import type { TranscriptionInstance } from '../transcription';
import { audioPatterns, plural } from './audio';

export const FAILED_DIRECTORY_NAME = 'failed';

export interface TranscribeConfig {
    inboxDirectory: string;
    processedDirectory: string;
    extensions: string[];
    transcripts: TranscriptStore;
    transcription: TranscriptionInstance;
}

const pad = (n: number) => n.toString().padStart(2, '0');

export const processedDirectoryFor = (processedDirectory: string, recordedAt: Date): string =>
    path.join(processedDirectory, recordedAt.getFullYear().toString(), pad(recordedAt.getMonth() + 1));

export const create = (config: TranscribeConfig): Stage.StageExecutor => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const transcribeFile = async (file: string): Promise<void> => {
        const fileName = path.basename(file);
        const recordedAt = await storage.getModifiedTime(file);

        logger.info('Transcribing %s', fileName);
        const result = await config.transcription.transcribe(file);
        const transcriptPath = await config.transcripts.write({
            source: fileName,
            recordedAt,
            model: result.model,
            text: result.text,
        });

        const directory = processedDirectoryFor(config.processedDirectory, recordedAt);
        await storage.moveFile(file, await Storage.freePath(storage, directory, fileName));
        logger.info('Transcribed %s to %s', fileName, transcriptPath);
    };

    const setAside = async (file: string): Promise<void> => {
        const directory = path.join(config.inboxDirectory, FAILED_DIRECTORY_NAME);
        await storage.moveFile(file, await Storage.freePath(storage, directory, path.basename(file)));
        logger.warn('Moved %s to %s', path.basename(file), directory);
    };

    const execute = async (ctx: Stage.RunContext): Promise<Stage.StageResult> => {
        if (!await storage.isDirectoryReadable(config.inboxDirectory)) {
            return Stage.skipped('nothing to do', 'inbox does not exist');
        }
        const files = await storage.listFiles(config.inboxDirectory, audioPatterns(config.extensions));
        if (files.length === 0) {
            return Stage.skipped('nothing to do', 'inbox is empty');
        }
        if (ctx.dryRun) {
            return Stage.succeeded(`would transcribe ${plural(files.length, 'file')}`);
        }

        const failures: { file: string; kind: Stage.ErrorKind; message: string }[] = [];
        for (const file of files) {
            try {
                await transcribeFile(file);
            } catch (error) {
                const kind = Stage.classifyError(error);
                const message = Stage.describeError(error);
                logger.error('Transcription of %s failed (%s): %s', path.basename(file), kind, message);
                failures.push({ file, kind, message });
                if (kind === 'permanent') {
                    await setAside(file);
                }
            }
        }

        if (failures.length > 0) {
            const kind = failures.some(failure => failure.kind === 'transient') ? 'transient' : 'permanent';
            const details = failures.map(failure => `${path.basename(failure.file)}: ${failure.message}`).join('; ');
            throw new Stage.StageError(kind, `${failures.length} of ${plural(files.length, 'file')} failed: ${details}`);
        }

        return Stage.succeeded(`transcribed ${plural(files.length, 'file')}`);
    };

    return {
        execute,
        classify: Stage.classifyError,
    };
};
