/**
 * Run History
 *
 * Keeps the last run of each pipeline in `runs.yaml` so an operator can see
 * when a pipeline last ran and what failed, without reading the logs.
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import * as Report from '../pipeline/report';
import * as Lock from '../ledger/lock';
import type { Notifier, RunReport } from '../pipeline/types';

const EntrySchema = z.object({
    runId: z.string(),
    status: z.enum(['AllSucceeded', 'PartialFailure', 'AllFailed']),
    startedAt: z.string(),
    finishedAt: z.string(),
    failedStages: z.array(z.string()).default([]),
});

const HistorySchema = z.record(z.string(), EntrySchema);

export type HistoryEntry = z.infer<typeof EntrySchema>;

export interface HistoryConfig {
    path: string;
}

export interface HistoryInstance extends Notifier {
    read(): Promise<Record<string, HistoryEntry>>;
    last(pipeline: string): Promise<HistoryEntry | undefined>;
}

export const create = (config: HistoryConfig): HistoryInstance => {
    const lock = Lock.create();

    const read = async (): Promise<Record<string, HistoryEntry>> => {
        let raw: string;
        try {
            raw = await fs.readFile(config.path, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                return {};
            }
            throw error;
        }
        const parsed = HistorySchema.safeParse(yaml.load(raw) ?? {});
        if (!parsed.success) {
            throw new Error(`Invalid run history ${config.path}: ${parsed.error.message}`);
        }
        return parsed.data;
    };

    const record = (report: RunReport): Promise<void> =>
        lock.run('history', async () => {
            const history = await read();
            history[report.pipeline] = {
                runId: report.runId,
                status: report.status,
                startedAt: report.startedAt.toISOString(),
                finishedAt: report.finishedAt.toISOString(),
                failedStages: Report.failedStages(report),
            };
            await fs.mkdir(path.dirname(config.path), { recursive: true });
            const tempPath = `${config.path}.${process.pid}.tmp`;
            await fs.writeFile(tempPath, yaml.dump(history), 'utf8');
            await fs.rename(tempPath, config.path);
        });

    return {
        notify: async (report) => {
            await record(report);
            return true;
        },
        read,
        last: async (pipeline) => (await read())[pipeline],
    };
};
