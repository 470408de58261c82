// eslint-disable-next-line no-restricted-imports
import * as fs from 'fs';
import { glob } from 'glob';
import path from 'node:path';

/**
 * Filesystem access for the stages and stores. Keeping it behind one
 * interface lets tests run against real temporary directories without
 * mocking fs.
 */

export interface Utility {
    exists: (path: string) => Promise<boolean>;
    isDirectory: (path: string) => Promise<boolean>;
    isFile: (path: string) => Promise<boolean>;
    isReadable: (path: string) => Promise<boolean>;
    isDirectoryReadable: (path: string) => Promise<boolean>;
    createDirectory: (path: string) => Promise<void>;
    readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
    readStream: (path: string) => Promise<fs.ReadStream>;
    writeFile: (path: string, data: string | Buffer, encoding: BufferEncoding) => Promise<void>;
    moveFile: (from: string, to: string) => Promise<void>;
    getFileSize: (path: string) => Promise<number>;
    getModifiedTime: (path: string) => Promise<Date>;
    /** Absolute paths of the files matching any pattern, sorted */
    listFiles: (directory: string, patterns: string[]) => Promise<string[]>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {

    // eslint-disable-next-line no-console
    const log = params.log || console.log;

    const exists = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.stat(path);
            return true;
        } catch {
            return false;
        }
    }

    const isDirectory = async (path: string): Promise<boolean> => {
        const stats = await fs.promises.stat(path);
        if (!stats.isDirectory()) {
            log(`${path} is not a directory`);
            return false;
        }
        return true;
    }

    const isFile = async (path: string): Promise<boolean> => {
        const stats = await fs.promises.stat(path);
        if (!stats.isFile()) {
            log(`${path} is not a file`);
            return false;
        }
        return true;
    }

    const isReadable = async (path: string): Promise<boolean> => {
        try {
            await fs.promises.access(path, fs.constants.R_OK);
        } catch (error) {
            log(`${path} is not readable: %s`, error instanceof Error ? error.message : String(error));
            return false;
        }
        return true;
    }

    const isDirectoryReadable = async (path: string): Promise<boolean> => {
        return await exists(path) && await isDirectory(path) && await isReadable(path);
    }

    const createDirectory = async (path: string): Promise<void> => {
        try {
            await fs.promises.mkdir(path, { recursive: true });
        } catch (mkdirError) {
            const message = mkdirError instanceof Error ? mkdirError.message : String(mkdirError);
            throw new Error(`Failed to create directory ${path}: ${message}`, { cause: mkdirError });
        }
    }

    const readFile = async (path: string, encoding: BufferEncoding): Promise<string> => {
        return await fs.promises.readFile(path, { encoding });
    }

    const readStream = async (path: string): Promise<fs.ReadStream> => {
        return fs.createReadStream(path);
    }

    const writeFile = async (path: string, data: string | Buffer, encoding: BufferEncoding): Promise<void> => {
        await fs.promises.writeFile(path, data, { encoding });
    }

    // rename() cannot cross devices (e.g. a synced cloud folder on another volume)
    const moveFile = async (from: string, to: string): Promise<void> => {
        await fs.promises.mkdir(path.dirname(to), { recursive: true });
        try {
            await fs.promises.rename(from, to);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
                await fs.promises.copyFile(from, to);
                await fs.promises.unlink(from);
                return;
            }
            throw error;
        }
    }

    const getFileSize = async (path: string): Promise<number> => {
        const stats = await fs.promises.stat(path);
        return stats.size;
    }

    const getModifiedTime = async (path: string): Promise<Date> => {
        const stats = await fs.promises.stat(path);
        return stats.mtime;
    }

    const listFiles = async (directory: string, patterns: string[]): Promise<string[]> => {
        try {
            const files = await glob(patterns, { cwd: directory, nodir: true, absolute: true });
            return files.sort();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to glob ${patterns.join(', ')} in ${directory}: ${message}`, { cause: error });
        }
    }

    return {
        exists,
        isDirectory,
        isFile,
        isReadable,
        isDirectoryReadable,
        createDirectory,
        readFile,
        readStream,
        writeFile,
        moveFile,
        getFileSize,
        getModifiedTime,
        listFiles,
    };
}

/** Picks a free name in the directory by adding -1, -2, ... before the extension */
export const freePath = async (utility: Utility, directory: string, fileName: string): Promise<string> => {
    const { name, ext } = path.parse(fileName);
    let candidate = path.join(directory, fileName);
    let counter = 1;
    while (await utility.exists(candidate)) {
        candidate = path.join(directory, `${name}-${counter}${ext}`);
        counter++;
    }
    return candidate;
};
