/**
 * Transcription System
 *
 * Main entry point for the transcription system. Provides a factory function
 * to create transcription instances that transcribe audio files through
 * the OpenAI transcription endpoint.
 */

import { TranscriptionConfig, TranscriptionResult, TranscriptionModel } from './types';
import * as Service from './service';

export interface TranscriptionInstance {
    transcribe(audioFile: string, options?: Partial<TranscriptionConfig>): Promise<TranscriptionResult>;
}

export interface CreateOptions {
    /** The transcription endpoint, usually `openai.audio.transcriptions` */
    api: Service.TranscriptionApi;
    defaultModel?: TranscriptionModel;
    language?: string;
    maxAudioSize?: number;
}

export const create = (options: CreateOptions): TranscriptionInstance => {
    const service = Service.create(options.api, { maxAudioSize: options.maxAudioSize });
    const defaultModel: TranscriptionModel = options.defaultModel ?? 'whisper-1';

    const transcribe = async (
        audioFile: string,
        configOptions: Partial<TranscriptionConfig> = {}
    ): Promise<TranscriptionResult> => {
        return service.transcribe({
            audioFile,
            config: {
                ...(options.language ? { language: options.language } : {}),
                ...configOptions,
                model: configOptions.model ?? defaultModel,
            },
        });
    };

    return { transcribe };
};

// Re-export types
export * from './types';
export type { TranscriptionApi } from './service';
