/**
 * Transcript Module
 *
 * Storage of transcribed diary entries.
 */

import * as Store from './store';

export type TranscriptStore = Store.StoreInstance;
export type { Transcript, NewTranscript, StoreConfig } from './store';

export const create = Store.create;
export const relativePath = Store.relativePath;
