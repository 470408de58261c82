
export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'dagbok';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_DRY_RUN = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';

export const DEFAULT_INBOX_DIRECTORY = './inbox';
export const DEFAULT_PROCESSED_DIRECTORY = './processed';
export const DEFAULT_TRANSCRIPTS_DIRECTORY = './transcripts';
export const DEFAULT_SUMMARIES_DIRECTORY = './summaries';
export const DEFAULT_STATE_DIRECTORY = `./.${PROGRAM_NAME}/state`;

export const LEDGER_FILE_NAME = 'ledger.yaml';
export const RUN_HISTORY_FILE_NAME = 'runs.yaml';

export const DEFAULT_AUDIO_EXTENSIONS = ['mp3', 'mp4', 'mpeg', 'mpga', 'm4a', 'wav', 'webm'];
export const ALLOWED_AUDIO_EXTENSIONS = ['mp3', 'mp4', 'mpeg', 'mpga', 'm4a', 'wav', 'webm', 'ogg', 'flac'];

export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1' as const;
export const DEFAULT_SUMMARY_MODEL = 'gpt-4o';
export const DEFAULT_MAX_AUDIO_SIZE = 26214400; // 25MB in bytes

export const DEFAULT_THREAD_RETENTION_DAYS = 30;
export const DEFAULT_ALLOW_OVERWRITE = false;
export const SUMMARY_THREAD_PURPOSE = 'summary-thread';
export const DEFAULT_ASSISTANT_INSTRUCTIONS = [
    'You summarize a personal voice diary.',
    'Each message contains the transcribed entries for a period, one entry per block, prefixed with its recording time.',
    'Write a concise summary in the first person: key events, decisions, moods and open tasks.',
].join(' ');

export const DEFAULT_RUNS_PER_DAY = 12;
export const DEFAULT_DIGEST_TIMES = ['23:55'];
export const MILLISECONDS_PER_DAY = 24 * 60 * 60 * 1000;

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;
export const DEFAULT_MAX_DELAY_MS = 60000;

export const DEFAULT_MAIL_SUBJECT_PREFIX = 'Voice Diary';
export const DEFAULT_SMTP_PORT = 587;

export const PIPELINE_NAMES = ['ingest', 'digest'] as const;
