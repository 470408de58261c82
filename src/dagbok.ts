import OpenAI from 'openai';
import * as path from 'node:path';
import * as Arguments from '@/arguments';
import * as Config from '@/config';
import { getLogger, setLogLevel } from '@/logging';
import * as Retry from '@/retry';
import * as Stage from '@/stage';
import * as Ledger from '@/ledger';
import * as Pipeline from '@/pipeline';
import * as Scheduler from '@/scheduler';
import * as Stages from '@/stages';
import * as Transcripts from '@/transcript';
import * as Transcription from '@/transcription';
import * as Assistant from '@/assistant';
import * as Notify from '@/notify';
import {
    LEDGER_FILE_NAME,
    PROGRAM_NAME,
    RUN_HISTORY_FILE_NAME,
    SUMMARY_THREAD_PURPOSE,
    VERSION,
} from '@/constants';

export interface Application {
    pipelines: Record<Arguments.PipelineName, Stage.StageDefinition[]>;
    orchestrator: Pipeline.PipelineOrchestrator;
    ledger: Ledger.SessionLedger;
    assistant: Assistant.AssistantClient;
    run(pipeline: Arguments.PipelineName, signal?: AbortSignal): Promise<Pipeline.RunReport>;
}

/** The parts of the OpenAI client the pipelines call */
export interface OpenAIClient {
    audio: { transcriptions: Transcription.TranscriptionApi };
    beta: Assistant.AssistantApi;
}

export interface AssembleOptions {
    config: Config.Config;
    secure: Config.SecureConfig;
    openai: OpenAIClient;
    mailTransport?: Notify.MailTransport;
    ledgerStore?: Ledger.LedgerStore;
    clock?: () => Date;
}

/** Wires the collaborators, ledger, runner and orchestrator for both pipelines */
export const assemble = (options: AssembleOptions): Application => {
    const { config, secure, openai } = options;
    const clock = options.clock ?? (() => new Date());

    const assistant = Assistant.create({
        api: openai.beta,
        assistantId: config.summary.assistantId,
        threadRetentionDays: config.summary.threadRetentionDays,
        clock,
    });
    const ledger = Ledger.create({
        store: options.ledgerStore ?? Ledger.createFileStore({ path: path.join(config.directories.state, LEDGER_FILE_NAME), clock }),
        factory: assistant,
        clock,
    });

    const mailer = config.mail.enabled
        ? Notify.createMailer({
            settings: { ...config.mail, password: secure.smtpPassword },
            transport: options.mailTransport,
        })
        : undefined;

    const notifiers: Pipeline.Notifier[] = [
        Notify.createLogNotifier(),
        Notify.createRunHistory({ path: path.join(config.directories.state, RUN_HISTORY_FILE_NAME) }),
    ];
    if (config.notifications.enabled && mailer) {
        notifiers.push(Notify.createMailNotifier({
            mailer,
            subjectPrefix: config.mail.subjectPrefix,
            onlyFailures: config.notifications.onlyFailures,
        }));
    }

    const runner = Stage.create({ policy: Retry.create(config.retry) });
    const orchestrator = Pipeline.create({
        ledger,
        runner,
        notifier: Notify.combine(...notifiers),
        clock,
    });

    const transcripts = Transcripts.create({ directory: config.directories.transcripts });
    const transcription = Transcription.create({
        api: openai.audio.transcriptions,
        defaultModel: config.transcription.model,
        language: config.transcription.language,
        maxAudioSize: config.transcription.maxAudioSize,
    });

    const pipelines: Application['pipelines'] = {
        ingest: Stages.ingest({
            acquire: {
                sourceDirectory: config.directories.source,
                inboxDirectory: config.directories.inbox,
                extensions: config.extensions,
            },
            transcribe: {
                inboxDirectory: config.directories.inbox,
                processedDirectory: config.directories.processed,
                extensions: config.extensions,
                transcripts,
                transcription,
            },
        }),
        digest: Stages.digest({
            summarize: {
                summariesDirectory: config.directories.summaries,
                transcripts,
                assistant,
                ledger,
            },
            email: {
                summariesDirectory: config.directories.summaries,
                mailer,
                subjectPrefix: config.mail.subjectPrefix,
            },
        }),
    };

    const run = (pipeline: Arguments.PipelineName, signal?: AbortSignal): Promise<Pipeline.RunReport> =>
        orchestrator.runOnce(pipelines[pipeline], {
            pipeline,
            window: Pipeline.Window.fromDateRange(config.summary.dateRange, clock()),
            allowOverwrite: config.summary.allowOverwrite,
            dryRun: config.dryRun,
            ...(signal ? { signal } : {}),
        });

    return { pipelines, orchestrator, ledger, assistant, run };
};

const waitForShutdown = (): Promise<string> => new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
});

const serve = async (app: Application, config: Config.Config): Promise<number> => {
    const logger = getLogger();
    const schedulers: Scheduler.SchedulerInstance[] = [];

    const ingestTrigger = Scheduler.Trigger.fromRunsPerDay(config.schedule.runsPerDay);
    if (ingestTrigger) {
        const ingest = Scheduler.create();
        ingest.start(ingestTrigger, { name: 'ingest', run: (signal) => app.run('ingest', signal) });
        schedulers.push(ingest);
    } else {
        logger.info('runsPerDay is 0: running ingest once');
        await app.run('ingest');
    }

    const digest = Scheduler.create();
    digest.start({ kind: 'daily', times: config.schedule.digestTimes }, { name: 'digest', run: (signal) => app.run('digest', signal) });
    schedulers.push(digest);

    const signal = await waitForShutdown();
    logger.info('Received %s, shutting down', signal);
    await Promise.all(schedulers.map(scheduler => scheduler.stop()));
    logger.info('Stopped');
    return 0;
};

const runOnce = async (app: Application, pipelines: Arguments.PipelineName[]): Promise<number> => {
    let allFailed = false;
    for (const pipeline of pipelines) {
        const report = await app.run(pipeline);
        if (report.status === 'AllFailed') {
            allFailed = true;
        }
    }
    return allFailed ? 1 : 0;
};

/** Resolves to the process exit code */
export async function main(
    argv: string[] = process.argv,
    createClient: (apiKey: string) => OpenAIClient = (apiKey) => new OpenAI({ apiKey }),
): Promise<number> {
    const logger = getLogger();

    let invocation: Arguments.Invocation;
    try {
        invocation = Arguments.parse(argv);
    } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        return 1;
    }

    if (invocation.overrides.verbose) {
        setLogLevel('verbose');
    }
    if (invocation.overrides.debug) {
        setLogLevel('debug');
    }

    const { action, configDirectory } = invocation;
    try {
        if (action.kind === 'init-config') {
            const file = await Config.init(configDirectory);
            logger.info('Wrote default configuration to %s', file);
            return 0;
        }

        const config = Config.applyOverrides(await Config.read(configDirectory), invocation.overrides);
        if (config.verbose) {
            setLogLevel('verbose');
        }
        if (config.debug) {
            setLogLevel('debug');
        }
        const secure = Config.readSecure(process.env);

        // Command results go to stdout; the logger writes to stderr
        if (action.kind === 'check-config') {
            process.stdout.write(Config.describe(config, secure));
            return 0;
        }

        if (!secure.openaiApiKey) {
            throw new Stage.ConfigurationError('OpenAI API key is required: set the OPENAI_API_KEY environment variable');
        }

        logger.info('Starting %s: %s', PROGRAM_NAME, VERSION);
        const app = assemble({ config, secure, openai: createClient(secure.openaiApiKey) });

        switch (action.kind) {
            case 'assistant-create': {
                const id = await app.assistant.createAssistant({
                    name: PROGRAM_NAME,
                    model: config.summary.model,
                    instructions: config.summary.instructions,
                });
                process.stdout.write(`${id}\n`);
                logger.info('Created assistant %s; set summary.assistantId to this id', id);
                return 0;
            }
            case 'rotate-session': {
                const dropped = await app.ledger.invalidateSession(SUMMARY_THREAD_PURPOSE);
                logger.info(dropped ? 'Summary thread dropped; the next digest starts a new one' : 'No summary thread to drop');
                return 0;
            }
            case 'once':
                return await runOnce(app, action.pipelines);
            case 'serve':
                return await serve(app, config);
        }
    } catch (error) {
        if (error instanceof Stage.ConfigurationError) {
            logger.error(error.message);
            return 1;
        }
        logger.error('Exiting due to error: %s', error instanceof Error ? error.stack ?? error.message : String(error));
        return 1;
    }
}
