import { vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { TranscriptionInstance } from '../../src/transcription';

export const makeTempDir = (prefix: string): Promise<string> =>
    fs.mkdtemp(path.join(os.tmpdir(), `dagbok-${prefix}-`));

/** Writes a fake recording and sets its modification time */
export const recording = async (directory: string, name: string, modified?: Date): Promise<string> => {
    await fs.mkdir(directory, { recursive: true });
    const file = path.join(directory, name);
    await fs.writeFile(file, 'not really audio');
    if (modified) {
        await fs.utimes(file, modified, modified);
    }
    return file;
};

export const listNames = async (directory: string): Promise<string[]> => {
    try {
        return (await fs.readdir(directory)).sort();
    } catch {
        return [];
    }
};

export const fakeTranscription = () => ({
    transcribe: vi.fn<TranscriptionInstance['transcribe']>(async () => ({
        text: 'Walked the dog.',
        model: 'whisper-1',
        duration: 1.5,
    })),
}) satisfies TranscriptionInstance;
