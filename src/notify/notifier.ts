/**
 * Run Notifiers
 *
 * Every notifier receives the finished report. They are best effort: a
 * notifier reports false instead of throwing, and one failing notifier never
 * keeps the others from running.
 */

import * as Logging from '../logging';
import * as Report from '../pipeline/report';
import type { Notifier, RunReport } from '../pipeline/types';
import type { MailerInstance } from './mailer';

export const createLogNotifier = (): Notifier => {
    const logger = Logging.getLogger();
    return {
        notify: async (report: RunReport) => {
            const text = Report.formatReport(report);
            if (report.status === 'AllSucceeded') {
                logger.info(text);
            } else {
                logger.warn(text);
            }
            return true;
        },
    };
};

export interface MailNotifierConfig {
    mailer: MailerInstance;
    subjectPrefix: string;
    /** Only mail reports of runs that had failures */
    onlyFailures?: boolean;
}

export const subjectFor = (report: RunReport, subjectPrefix: string): string =>
    `${subjectPrefix} ${report.pipeline} run ${report.status}`;

export const createMailNotifier = (config: MailNotifierConfig): Notifier => {
    const logger = Logging.getLogger();
    return {
        notify: async (report: RunReport) => {
            if (config.onlyFailures && report.status === 'AllSucceeded') {
                return true;
            }
            try {
                await config.mailer.send({
                    subject: subjectFor(report, config.subjectPrefix),
                    text: Report.formatReport(report),
                });
                return true;
            } catch (error) {
                logger.error('Could not mail report for %s: %s', report.runId, error instanceof Error ? error.message : String(error));
                return false;
            }
        },
    };
};

/** Runs every notifier; the result is true only when all of them succeeded */
export const combine = (...notifiers: Notifier[]): Notifier => {
    const logger = Logging.getLogger();
    return {
        notify: async (report: RunReport) => {
            const results = await Promise.allSettled(notifiers.map(notifier => notifier.notify(report)));
            let ok = true;
            for (const result of results) {
                if (result.status === 'rejected') {
                    logger.error('Notifier failed for %s: %s', report.runId, result.reason instanceof Error ? result.reason.message : String(result.reason));
                    ok = false;
                } else if (!result.value) {
                    ok = false;
                }
            }
            return ok;
        },
    };
};
