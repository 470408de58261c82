/**
 * Transcription System Types
 *
 * Supports the OpenAI transcription models. A transcript is the raw text of
 * one diary recording; summarization happens later over a whole day.
 */

export type TranscriptionModel =
    | 'whisper-1'
    | 'gpt-4o-mini-transcribe'
    | 'gpt-4o-transcribe';

export interface TranscriptionConfig {
    model: TranscriptionModel;
    language?: string;
    prompt?: string;
    temperature?: number;
}

export interface TranscriptionRequest {
    audioFile: string;
    config: TranscriptionConfig;
}

export interface TranscriptionResult {
    text: string;
    model: string;
    duration: number;
}

export interface ModelCapabilities {
    maxFileSize: number;
}

export const MODEL_CAPABILITIES: Record<TranscriptionModel, ModelCapabilities> = {
    'whisper-1': {
        maxFileSize: 25 * 1024 * 1024,  // 25 MB
    },
    'gpt-4o-mini-transcribe': {
        maxFileSize: 25 * 1024 * 1024,
    },
    'gpt-4o-transcribe': {
        maxFileSize: 25 * 1024 * 1024,
    },
};
