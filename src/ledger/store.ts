/**
 * Ledger Stores
 *
 * The file store keeps sessions and processed window keys in a single YAML
 * document. Every change rewrites the document through a temporary file and
 * a rename, so a crash leaves either the old or the new version on disk.
 */

import * as yaml from 'js-yaml';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import * as Logging from '../logging';
import * as Lock from './lock';
import { DuplicateGuardKey, LedgerStore, SessionHandle } from './types';

const SessionSchema = z.object({
    id: z.string().min(1),
    purpose: z.string().min(1),
    createdAt: z.coerce.date(),
    retentionMs: z.number().positive(),
});

const DocumentSchema = z.object({
    sessions: z.record(z.string(), SessionSchema).default({}),
    processed: z.record(z.string(), z.union([z.string(), z.date()])).default({}),
});

type LedgerDocument = z.infer<typeof DocumentSchema>;

export interface FileStoreConfig {
    path: string;
    clock?: () => Date;
}

export const createMemoryStore = (): LedgerStore => {
    const sessions = new Map<string, SessionHandle>();
    const processed = new Set<DuplicateGuardKey>();

    return {
        loadSession: async (purpose) => {
            const handle = sessions.get(purpose);
            return handle ? { ...handle } : undefined;
        },
        saveSession: async (handle) => {
            sessions.set(handle.purpose, { ...handle });
        },
        removeSession: async (purpose) => {
            sessions.delete(purpose);
        },
        load: async (key) => processed.has(key),
        store: async (key) => {
            processed.add(key);
        },
    };
};

export const createFileStore = (config: FileStoreConfig): LedgerStore => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());
    const lock = Lock.create();

    // No in-memory copy: other processes share the file
    const read = async (): Promise<LedgerDocument> => {
        let raw: string;
        try {
            raw = await fs.readFile(config.path, 'utf8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                logger.debug('No ledger at %s, starting empty', config.path);
                return { sessions: {}, processed: {} };
            }
            throw error;
        }

        const parsed = DocumentSchema.safeParse(yaml.load(raw) ?? {});
        if (!parsed.success) {
            throw new Error(`Invalid ledger file ${config.path}: ${parsed.error.message}`);
        }
        return parsed.data;
    };

    const write = async (document: LedgerDocument): Promise<void> => {
        const serializable = {
            sessions: Object.fromEntries(
                Object.entries(document.sessions).map(([purpose, handle]) => [purpose, {
                    id: handle.id,
                    purpose: handle.purpose,
                    createdAt: handle.createdAt.toISOString(),
                    retentionMs: handle.retentionMs,
                }])
            ),
            processed: Object.fromEntries(
                Object.entries(document.processed).map(([key, at]) => [key, at instanceof Date ? at.toISOString() : at])
            ),
        };

        await fs.mkdir(path.dirname(config.path), { recursive: true });
        const tempPath = `${config.path}.${process.pid}.tmp`;
        await fs.writeFile(tempPath, yaml.dump(serializable), 'utf8');
        await fs.rename(tempPath, config.path);
    };

    // Read-modify-write cycles share one lock so concurrent keys cannot lose updates
    const update = (mutate: (document: LedgerDocument) => LedgerDocument): Promise<void> =>
        lock.run('document', async () => {
            const current = await read();
            await write(mutate(current));
        });

    return {
        loadSession: async (purpose) => {
            const document = await read();
            const handle = document.sessions[purpose];
            return handle ? { ...handle } : undefined;
        },
        saveSession: (handle) => update((document) => ({
            ...document,
            sessions: { ...document.sessions, [handle.purpose]: { ...handle } },
        })),
        removeSession: (purpose) => update((document) => {
            const { [purpose]: _removed, ...sessions } = document.sessions;
            return { ...document, sessions };
        }),
        load: async (key) => {
            const document = await read();
            return Object.prototype.hasOwnProperty.call(document.processed, key);
        },
        store: (key) => update((document) => ({
            ...document,
            processed: { ...document.processed, [key]: clock().toISOString() },
        })),
    };
};
