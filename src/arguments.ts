import { Command } from "commander";
import { DEFAULT_CONFIG_DIR, PIPELINE_NAMES, PROGRAM_NAME, VERSION } from "@/constants";
import { ConfigurationError } from "@/stage/errors";
import { Overrides } from "@/config";

export type PipelineName = typeof PIPELINE_NAMES[number];

export interface Args {
    configDirectory?: string;
    once?: string | boolean;
    allowOverwrite?: boolean;
    dryRun?: boolean;
    verbose?: boolean;
    debug?: boolean;
    initConfig?: boolean;
    checkConfig?: boolean;
    assistantCreate?: boolean;
    rotateSession?: boolean;
}

export type Action =
    | { kind: 'serve' }
    | { kind: 'once'; pipelines: PipelineName[] }
    | { kind: 'init-config' }
    | { kind: 'check-config' }
    | { kind: 'assistant-create' }
    | { kind: 'rotate-session' };

export interface Invocation {
    configDirectory: string;
    action: Action;
    overrides: Overrides;
}

const isPipelineName = (value: string): value is PipelineName =>
    PIPELINE_NAMES.some(name => name === value);

const resolveOnce = (value: string | boolean): PipelineName[] => {
    if (value === true || value === 'all') {
        return [...PIPELINE_NAMES];
    }
    if (typeof value === 'string' && isPipelineName(value)) {
        return [value];
    }
    throw new ConfigurationError(`Unknown pipeline "${String(value)}": expected ${PIPELINE_NAMES.join(', ')} or all`);
};

export const resolveAction = (args: Args): Action => {
    const selected = [
        args.initConfig && 'init-config',
        args.checkConfig && 'check-config',
        args.assistantCreate && 'assistant-create',
        args.rotateSession && 'rotate-session',
        args.once !== undefined && args.once !== false && 'once',
    ].filter((name): name is string => typeof name === 'string');

    if (selected.length > 1) {
        throw new ConfigurationError(`Options cannot be combined: ${selected.map(name => `--${name}`).join(', ')}`);
    }

    if (args.initConfig) return { kind: 'init-config' };
    if (args.checkConfig) return { kind: 'check-config' };
    if (args.assistantCreate) return { kind: 'assistant-create' };
    if (args.rotateSession) return { kind: 'rotate-session' };
    if (args.once !== undefined && args.once !== false) return { kind: 'once', pipelines: resolveOnce(args.once) };
    return { kind: 'serve' };
};

export const createProgram = (): Command => new Command()
    .name(PROGRAM_NAME)
    .summary('Voice diary: transcribe recordings and summarize each day')
    .description('Transcribes recordings from a synced folder on a schedule and mails a daily summary written by an OpenAI assistant')
    .option('-c, --config-directory <configDirectory>', 'directory holding config.yaml', DEFAULT_CONFIG_DIR)
    .option('--once [pipeline]', 'run ingest, digest or all once and exit')
    .option('--allow-overwrite', 'process work windows that were already processed')
    .option('--dry-run', 'perform a dry run without calling the APIs or writing files')
    .option('--verbose', 'enable verbose logging')
    .option('--debug', 'enable debug logging')
    .option('--init-config', 'write a default config.yaml to the config directory')
    .option('--check-config', 'print the merged configuration and exit')
    .option('--assistant-create', 'create the summary assistant and print its id')
    .option('--rotate-session', 'drop the summary thread so the next digest starts a new one')
    .version(VERSION);

export const parse = (argv: string[]): Invocation => {
    const program = createProgram();
    program.parse(argv);

    const args = program.opts<Args>();
    return {
        configDirectory: args.configDirectory ?? DEFAULT_CONFIG_DIR,
        action: resolveAction(args),
        overrides: {
            ...(args.dryRun !== undefined ? { dryRun: args.dryRun } : {}),
            ...(args.verbose !== undefined ? { verbose: args.verbose } : {}),
            ...(args.debug !== undefined ? { debug: args.debug } : {}),
            ...(args.allowOverwrite !== undefined ? { allowOverwrite: args.allowOverwrite } : {}),
        },
    };
};
