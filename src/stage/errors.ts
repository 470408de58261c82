/**
 * Stage Errors
 *
 * Error types and the shared classifier used by the collaborator executors
 * (OpenAI, filesystem, SMTP) to tag failures as transient or permanent.
 */

import OpenAI from 'openai';
import { ErrorKind } from './types';

export class StageError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StageError';
        this.kind = kind;
    }
}

export class DuplicateStageError extends Error {
    readonly stageId: string;

    constructor(stageId: string) {
        super(`Duplicate stage identifier: ${stageId}`);
        this.name = 'DuplicateStageError';
        this.stageId = stageId;
    }
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export const transient = (message: string, cause?: unknown): StageError =>
    new StageError('transient', message, { cause });

export const permanent = (message: string, cause?: unknown): StageError =>
    new StageError('permanent', message, { cause });

const TRANSIENT_SYSTEM_CODES = new Set([
    'ETIMEDOUT',
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'EAI_AGAIN',
    'ENOTFOUND',
    'EPIPE',
    'EBUSY',
    'EMFILE',
    'ESOCKET',
    'ECONNECTION',
]);

const TRANSIENT_HTTP_STATUSES = new Set([408, 409, 429]);

const readProperty = (error: unknown, key: string): unknown => {
    if (typeof error !== 'object' || error === null || !(key in error)) {
        return undefined;
    }
    return Reflect.get(error, key);
};

export const classifyError = (error: unknown): ErrorKind => {
    if (error instanceof StageError) {
        return error.kind;
    }

    if (error instanceof OpenAI.APIError) {
        // Connection errors and timeouts carry no status
        const status = error.status;
        if (status === undefined || TRANSIENT_HTTP_STATUSES.has(status) || status >= 500) {
            return 'transient';
        }
        return 'permanent';
    }

    const code = readProperty(error, 'code');
    if (typeof code === 'string' && TRANSIENT_SYSTEM_CODES.has(code)) {
        return 'transient';
    }

    // nodemailer exposes the SMTP reply code
    const responseCode = readProperty(error, 'responseCode');
    if (typeof responseCode === 'number') {
        return responseCode >= 400 && responseCode < 500 ? 'transient' : 'permanent';
    }

    return 'permanent';
};

export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
};
