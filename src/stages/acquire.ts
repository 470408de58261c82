/**
 * Acquire Stage
 *
 * Moves new recordings from the synced source folder into the inbox. Without
 * a configured source the inbox is filled by hand and there is nothing to do.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Stage from '../stage';
import { audioPatterns, plural } from './audio';

export interface AcquireConfig {
    sourceDirectory?: string;
    inboxDirectory: string;
    extensions: string[];
}

export const create = (config: AcquireConfig): Stage.StageExecutor => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const execute = async (ctx: Stage.RunContext): Promise<Stage.StageResult> => {
        const source = config.sourceDirectory;
        if (!source) {
            return Stage.skipped('nothing to do', 'no source directory configured');
        }
        // A synced folder on a network or cloud volume can be briefly unmounted
        if (!await storage.isDirectoryReadable(source)) {
            throw Stage.transient(`Source directory ${source} is not available`);
        }

        const files = await storage.listFiles(source, audioPatterns(config.extensions));
        if (files.length === 0) {
            return Stage.skipped('nothing to do', 'no new recordings');
        }
        if (ctx.dryRun) {
            return Stage.succeeded(`would acquire ${plural(files.length, 'file')}`);
        }

        await storage.createDirectory(config.inboxDirectory);
        const acquired: string[] = [];
        for (const file of files) {
            const target = await Storage.freePath(storage, config.inboxDirectory, path.basename(file));
            await storage.moveFile(file, target);
            logger.info('Acquired %s', path.basename(target));
            acquired.push(path.basename(target));
        }

        return Stage.succeeded(`acquired ${plural(acquired.length, 'file')}: ${acquired.join(', ')}`);
    };

    return {
        execute,
        classify: Stage.classifyError,
    };
};
