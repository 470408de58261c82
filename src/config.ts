/**
 * Configuration
 *
 * Loaded from `<configDirectory>/config.yaml` and validated with zod. Every
 * field has a default, so an empty or missing file is a valid configuration.
 * Secrets never live in the file; they come from the environment.
 */

import * as yaml from 'js-yaml';
import * as path from 'node:path';
import { z } from 'zod';
import * as Storage from '@/util/storage';
import { getLogger } from '@/logging';
import { ConfigurationError } from '@/stage/errors';
import {
    DEFAULT_ALLOW_OVERWRITE,
    DEFAULT_ASSISTANT_INSTRUCTIONS,
    DEFAULT_AUDIO_EXTENSIONS,
    ALLOWED_AUDIO_EXTENSIONS,
    DEFAULT_BASE_DELAY_MS,
    DEFAULT_CONFIG_FILE_NAME,
    DEFAULT_DEBUG,
    DEFAULT_DIGEST_TIMES,
    DEFAULT_DRY_RUN,
    DEFAULT_INBOX_DIRECTORY,
    DEFAULT_MAIL_SUBJECT_PREFIX,
    DEFAULT_MAX_ATTEMPTS,
    DEFAULT_MAX_AUDIO_SIZE,
    DEFAULT_MAX_DELAY_MS,
    DEFAULT_PROCESSED_DIRECTORY,
    DEFAULT_RUNS_PER_DAY,
    DEFAULT_SMTP_PORT,
    DEFAULT_STATE_DIRECTORY,
    DEFAULT_SUMMARIES_DIRECTORY,
    DEFAULT_SUMMARY_MODEL,
    DEFAULT_THREAD_RETENTION_DAYS,
    DEFAULT_TRANSCRIPTION_MODEL,
    DEFAULT_TRANSCRIPTS_DIRECTORY,
    DEFAULT_VERBOSE,
} from '@/constants';

const TIME_OF_DAY = /^([01]?\d|2[0-3]):[0-5]\d$/;

export const ConfigSchema = z.object({
    dryRun: z.boolean().default(DEFAULT_DRY_RUN),
    verbose: z.boolean().default(DEFAULT_VERBOSE),
    debug: z.boolean().default(DEFAULT_DEBUG),
    directories: z.object({
        source: z.string().min(1).optional(),
        inbox: z.string().min(1).default(DEFAULT_INBOX_DIRECTORY),
        processed: z.string().min(1).default(DEFAULT_PROCESSED_DIRECTORY),
        transcripts: z.string().min(1).default(DEFAULT_TRANSCRIPTS_DIRECTORY),
        summaries: z.string().min(1).default(DEFAULT_SUMMARIES_DIRECTORY),
        state: z.string().min(1).default(DEFAULT_STATE_DIRECTORY),
    }).default({}),
    extensions: z.array(
        z.string().refine(ext => ALLOWED_AUDIO_EXTENSIONS.includes(ext.toLowerCase()), {
            message: `Extension must be one of ${ALLOWED_AUDIO_EXTENSIONS.join(', ')}`,
        })
    ).min(1).default(DEFAULT_AUDIO_EXTENSIONS),
    transcription: z.object({
        model: z.enum(['whisper-1', 'gpt-4o-mini-transcribe', 'gpt-4o-transcribe']).default(DEFAULT_TRANSCRIPTION_MODEL),
        language: z.string().min(2).optional(),
        maxAudioSize: z.number().int().positive().default(DEFAULT_MAX_AUDIO_SIZE),
    }).default({}),
    summary: z.object({
        assistantId: z.string().min(1).optional(),
        model: z.string().min(1).default(DEFAULT_SUMMARY_MODEL),
        threadRetentionDays: z.number().positive().default(DEFAULT_THREAD_RETENTION_DAYS),
        allowOverwrite: z.boolean().default(DEFAULT_ALLOW_OVERWRITE),
        dateRange: z.array(z.number().int()).max(2).default([]),
        instructions: z.string().min(1).default(DEFAULT_ASSISTANT_INSTRUCTIONS),
    }).default({}),
    schedule: z.object({
        runsPerDay: z.number().int().min(0).default(DEFAULT_RUNS_PER_DAY),
        digestTimes: z.array(z.string().regex(TIME_OF_DAY, 'Expected HH:mm')).min(1).default(DEFAULT_DIGEST_TIMES),
    }).default({}),
    retry: z.object({
        maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
        baseDelayMs: z.number().int().min(0).default(DEFAULT_BASE_DELAY_MS),
        maxDelayMs: z.number().int().min(0).default(DEFAULT_MAX_DELAY_MS),
    }).default({}).refine(retry => retry.maxDelayMs >= retry.baseDelayMs, {
        message: 'maxDelayMs must not be smaller than baseDelayMs',
    }),
    mail: z.object({
        enabled: z.boolean().default(false),
        host: z.string().min(1).optional(),
        port: z.number().int().positive().default(DEFAULT_SMTP_PORT),
        secure: z.boolean().default(false),
        user: z.string().min(1).optional(),
        from: z.string().email().optional(),
        to: z.array(z.string().email()).default([]),
        subjectPrefix: z.string().default(DEFAULT_MAIL_SUBJECT_PREFIX),
    }).default({}).superRefine((mail, ctx) => {
        if (!mail.enabled) {
            return;
        }
        if (!mail.host) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['host'], message: 'Required when mail is enabled' });
        }
        if (mail.to.length === 0) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['to'], message: 'At least one recipient is required when mail is enabled' });
        }
        if (!mail.from && !mail.user) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['from'], message: 'Set from or user when mail is enabled' });
        }
    }),
    notifications: z.object({
        enabled: z.boolean().default(false),
        onlyFailures: z.boolean().default(false),
    }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface SecureConfig {
    openaiApiKey?: string;
    smtpPassword?: string;
}

export interface Overrides {
    dryRun?: boolean;
    verbose?: boolean;
    debug?: boolean;
    allowOverwrite?: boolean;
}

export const configPath = (configDirectory: string): string =>
    path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

const formatIssues = (error: z.ZodError): string =>
    error.issues
        .map(issue => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('\n');

export const parse = (raw: unknown, source = 'configuration'): Config => {
    const result = ConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigurationError(`Invalid ${source}:\n${formatIssues(result.error)}`);
    }
    return result.data;
};

export const defaults = (): Config => parse({});

/** Reads and validates the config file; a missing file yields the defaults */
export const read = async (configDirectory: string): Promise<Config> => {
    const logger = getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const file = configPath(configDirectory);

    if (!await storage.exists(file)) {
        logger.debug('No configuration file at %s, using defaults', file);
        return defaults();
    }

    let raw: unknown;
    try {
        raw = yaml.load(await storage.readFile(file, 'utf8'));
    } catch (error) {
        throw new ConfigurationError(`Could not parse ${file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (raw !== undefined && raw !== null && (typeof raw !== 'object' || Array.isArray(raw))) {
        throw new ConfigurationError(`${file} must contain a YAML mapping`);
    }

    logger.debug('Loaded configuration from %s', file);
    return parse(raw, file);
};

/** CLI flags take precedence over the file */
export const applyOverrides = (config: Config, overrides: Overrides): Config => ({
    ...config,
    ...(overrides.dryRun !== undefined ? { dryRun: overrides.dryRun } : {}),
    ...(overrides.verbose !== undefined ? { verbose: overrides.verbose } : {}),
    ...(overrides.debug !== undefined ? { debug: overrides.debug } : {}),
    summary: {
        ...config.summary,
        ...(overrides.allowOverwrite !== undefined ? { allowOverwrite: overrides.allowOverwrite } : {}),
    },
});

export const readSecure = (env: NodeJS.ProcessEnv): SecureConfig => ({
    ...(env.OPENAI_API_KEY ? { openaiApiKey: env.OPENAI_API_KEY } : {}),
    ...(env.SMTP_PASSWORD ? { smtpPassword: env.SMTP_PASSWORD } : {}),
});

export const renderDefault = (): string => [
    '# dagbok configuration',
    '# Secrets are read from the environment: OPENAI_API_KEY, SMTP_PASSWORD',
    yaml.dump(defaults()),
].join('\n');

/** Writes a default config.yaml; refuses to replace an existing one */
export const init = async (configDirectory: string): Promise<string> => {
    const logger = getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const file = configPath(configDirectory);

    if (await storage.exists(file)) {
        throw new ConfigurationError(`Configuration file ${file} already exists`);
    }
    await storage.createDirectory(configDirectory);
    await storage.writeFile(file, renderDefault(), 'utf8');
    return file;
};

/** Merged configuration as YAML, with secrets reduced to whether they are set */
export const describe = (config: Config, secure: SecureConfig): string => yaml.dump({
    ...config,
    secrets: {
        OPENAI_API_KEY: secure.openaiApiKey ? 'set' : 'not set',
        SMTP_PASSWORD: secure.smtpPassword ? 'set' : 'not set',
    },
});
