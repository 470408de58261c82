/**
 * Transcript Store
 *
 * Transcripts are Markdown files with YAML frontmatter, filed by recording
 * date under `YYYY/MM/DD/`. The frontmatter carries the machine-readable
 * data; the body is the transcribed text.
 */

import matter from 'gray-matter';
import path from 'node:path';
import { z } from 'zod';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Window from '../pipeline/window';
import type { WorkWindow } from '../stage/types';

const FrontmatterSchema = z.object({
    source: z.string(),
    recordedAt: z.coerce.date(),
    model: z.string(),
});

export interface NewTranscript {
    /** File name of the audio the transcript came from */
    source: string;
    recordedAt: Date;
    model: string;
    text: string;
}

export interface Transcript extends NewTranscript {
    path: string;
}

export interface StoreConfig {
    directory: string;
}

export interface StoreInstance {
    write(transcript: NewTranscript): Promise<string>;
    read(filePath: string): Promise<Transcript | null>;
    /** Transcripts recorded inside the window, oldest first */
    list(window: WorkWindow): Promise<Transcript[]>;
}

const pad = (n: number) => n.toString().padStart(2, '0');

export const relativePath = (transcript: Pick<NewTranscript, 'source' | 'recordedAt'>): string => {
    const at = transcript.recordedAt;
    const base = path.parse(transcript.source).name.replace(/[^A-Za-z0-9._-]+/g, '-');
    return path.join(
        at.getFullYear().toString(),
        pad(at.getMonth() + 1),
        pad(at.getDate()),
        `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}-${base}.md`,
    );
};

export const create = (config: StoreConfig): StoreInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const write = async (transcript: NewTranscript): Promise<string> => {
        // note.m4a and note.mp3 from the same second share a name; the second gets a suffix
        const preferred = path.join(config.directory, relativePath(transcript));
        const target = await Storage.freePath(storage, path.dirname(preferred), path.basename(preferred));
        const content = matter.stringify(`${transcript.text.trim()}\n`, {
            source: transcript.source,
            recordedAt: transcript.recordedAt.toISOString(),
            model: transcript.model,
        });
        await storage.createDirectory(path.dirname(target));
        await storage.writeFile(target, content, 'utf8');
        logger.debug('Wrote transcript %s', target);
        return target;
    };

    const read = async (filePath: string): Promise<Transcript | null> => {
        const raw = await storage.readFile(filePath, 'utf8');
        const parsed = matter(raw);
        const frontmatter = FrontmatterSchema.safeParse(parsed.data);
        if (!frontmatter.success) {
            logger.warn('Ignoring transcript %s: invalid frontmatter', filePath);
            return null;
        }
        return {
            ...frontmatter.data,
            text: parsed.content.trim(),
            path: filePath,
        };
    };

    const list = async (window: WorkWindow): Promise<Transcript[]> => {
        if (!await storage.exists(config.directory)) {
            return [];
        }
        const files = await storage.listFiles(config.directory, ['**/*.md']);
        const transcripts: Transcript[] = [];
        for (const file of files) {
            const transcript = await read(file);
            if (transcript && Window.contains(window, transcript.recordedAt)) {
                transcripts.push(transcript);
            }
        }
        return transcripts.sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime());
    };

    return {
        write,
        read,
        list,
    };
};
