/**
 * Email Stage
 *
 * Mails the window's summary. Disabled mail or a missing summary is an
 * intentional skip, not a failure.
 */

import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Stage from '../stage';
import * as Window from '../pipeline/window';
import type { MailerInstance } from '../notify';
import { summaryPath } from './summarize';

export interface EmailConfig {
    summariesDirectory: string;
    /** Absent when mail is disabled */
    mailer?: MailerInstance;
    subjectPrefix: string;
}

export const subjectFor = (subjectPrefix: string, window: Stage.WorkWindow): string =>
    `${subjectPrefix} Summary for ${Window.describeWindow(window)}`;

export const create = (config: EmailConfig): Stage.StageExecutor => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const execute = async (ctx: Stage.RunContext): Promise<Stage.StageResult> => {
        if (!config.mailer) {
            return Stage.skipped('nothing to do', 'mail is disabled');
        }

        const file = summaryPath(config.summariesDirectory, ctx.window);
        const description = Window.describeWindow(ctx.window);
        if (!(await storage.exists(file) && await storage.isFile(file))) {
            return Stage.skipped('nothing to do', `no summary for ${description}`);
        }
        if (ctx.dryRun) {
            return Stage.succeeded(`would mail the summary for ${description}`);
        }

        const text = await storage.readFile(file, 'utf8');
        await config.mailer.send({ subject: subjectFor(config.subjectPrefix, ctx.window), text });

        return Stage.succeeded(`mailed the summary for ${description}`);
    };

    return {
        execute,
        classify: Stage.classifyError,
    };
};
