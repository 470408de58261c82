/**
 * Assistant Client
 *
 * Talks to an OpenAI assistant through a long-lived thread. Threads are the
 * sessions the ledger hands out: the client creates them, retires them once
 * they are rotated out, and posts the day's entries to them for a summary.
 */

import OpenAI from 'openai';
import * as Logging from '../logging';
import { permanent, transient } from '../stage/errors';
import type { SessionFactory, SessionHandle } from '../ledger/types';
import { MILLISECONDS_PER_DAY } from '../constants';

interface ContentBlock {
    type: string;
    text?: { value: string };
}

/** The part of the OpenAI SDK the client calls (`openai.beta`) */
export interface AssistantApi {
    threads: {
        create(body: { metadata: Record<string, string> }): PromiseLike<{ id: string }>;
        del(threadId: string): PromiseLike<unknown>;
        messages: {
            create(threadId: string, body: { role: 'user'; content: string }): PromiseLike<unknown>;
            list(threadId: string, query: { run_id: string; order: 'desc' }): PromiseLike<{
                data: Array<{ role: string; content: ContentBlock[] }>;
            }>;
        };
        runs: {
            createAndPoll(threadId: string, body: { assistant_id: string }): PromiseLike<{
                id: string;
                status: string;
                last_error: { code: string; message: string } | null;
            }>;
        };
    };
    assistants: {
        create(body: { name: string; model: string; instructions: string }): PromiseLike<{ id: string }>;
    };
}

export interface AssistantConfig {
    api: AssistantApi;
    assistantId?: string;
    threadRetentionDays: number;
    clock?: () => Date;
}

export interface CreateAssistantOptions {
    name: string;
    model: string;
    instructions: string;
}

export interface ClientInstance extends SessionFactory {
    /** Posts the content to the thread, runs the assistant and returns its reply */
    summarize(threadId: string, content: string): Promise<string>;
    createAssistant(options: CreateAssistantOptions): Promise<string>;
}

/** Run errors the provider reports as temporary */
const TRANSIENT_RUN_ERRORS = new Set(['rate_limit_exceeded', 'server_error']);

export const create = (config: AssistantConfig): ClientInstance => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());
    const { threads, assistants } = config.api;

    const createThread = async (purpose: string): Promise<SessionHandle> => {
        const thread = await threads.create({ metadata: { purpose } });
        logger.info('Created assistant thread %s for %s', thread.id, purpose);
        return {
            id: thread.id,
            purpose,
            createdAt: clock(),
            retentionMs: config.threadRetentionDays * MILLISECONDS_PER_DAY,
        };
    };

    const retire = async (handle: SessionHandle): Promise<void> => {
        await threads.del(handle.id);
        logger.info('Deleted assistant thread %s', handle.id);
    };

    const summarize = async (threadId: string, content: string): Promise<string> => {
        if (!config.assistantId) {
            throw permanent('No assistant configured: set summary.assistantId or run with --assistant-create');
        }

        await threads.messages.create(threadId, { role: 'user', content });

        const startTime = Date.now();
        const run = await threads.runs.createAndPoll(threadId, { assistant_id: config.assistantId });
        const duration = ((Date.now() - startTime) / 1000).toFixed(1);
        logger.debug('Assistant run %s finished with %s in %ss', run.id, run.status, duration);

        if (run.status !== 'completed') {
            const reason = run.last_error ? `${run.last_error.code}: ${run.last_error.message}` : run.status;
            const message = `Assistant run ${run.id} ended ${run.status} (${reason})`;
            if (run.status === 'expired' || (run.last_error && TRANSIENT_RUN_ERRORS.has(run.last_error.code))) {
                throw transient(message);
            }
            throw permanent(message);
        }

        const messages = await threads.messages.list(threadId, { run_id: run.id, order: 'desc' });
        const reply = messages.data.find(message => message.role === 'assistant');
        const text = reply?.content
            .flatMap(block => block.type === 'text' && block.text ? [block.text.value] : [])
            .join('\n')
            .trim();
        if (!text) {
            throw transient(`Assistant run ${run.id} produced no text reply`);
        }
        return text;
    };

    const createAssistant = async (options: CreateAssistantOptions): Promise<string> => {
        const assistant = await assistants.create({
            name: options.name,
            model: options.model,
            instructions: options.instructions,
        });
        logger.info('Created assistant %s (%s)', assistant.id, options.model);
        return assistant.id;
    };

    return {
        create: createThread,
        retire,
        summarize,
        createAssistant,
    };
};

/** True when the provider no longer knows the thread */
export const isThreadMissing = (error: unknown): boolean =>
    error instanceof OpenAI.NotFoundError;
