/**
 * Shared helpers for the stages that handle audio files.
 */

/** Top-level patterns only: subdirectories of the inbox are not scanned */
export const audioPatterns = (extensions: string[]): string[] =>
    extensions.flatMap(ext => [`*.${ext.toLowerCase()}`, `*.${ext.toUpperCase()}`]);

export const plural = (count: number, noun: string): string =>
    `${count} ${noun}${count === 1 ? '' : 's'}`;
