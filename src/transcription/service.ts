/**
 * Transcription Service
 *
 * Handles audio transcription using OpenAI's transcription models.
 * Oversized files are rejected up front: the API would refuse them anyway.
 */

import type { ReadStream } from 'fs';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { permanent } from '../stage/errors';
import {
    TranscriptionRequest,
    TranscriptionResult,
    MODEL_CAPABILITIES,
} from './types';

/** The part of the OpenAI SDK the service calls (`openai.audio.transcriptions`) */
export interface TranscriptionApi {
    create(body: {
        model: string;
        file: ReadStream;
        response_format: 'json';
        language?: string;
        prompt?: string;
        temperature?: number;
    }): PromiseLike<{ text: string }>;
}

export interface ServiceInstance {
    transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
}

export interface ServiceOptions {
    maxAudioSize?: number;
}

export const create = (api: TranscriptionApi, options: ServiceOptions = {}): ServiceInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });

    const transcribe = async (request: TranscriptionRequest): Promise<TranscriptionResult> => {
        const { audioFile, config } = request;

        logger.debug('Starting transcription', { model: config.model, file: audioFile });

        const maxSize = Math.min(options.maxAudioSize ?? Infinity, MODEL_CAPABILITIES[config.model].maxFileSize);
        const fileSize = await storage.getFileSize(audioFile);
        const fileSizeMB = (fileSize / (1024 * 1024)).toFixed(1);
        logger.debug(`Audio file size: ${fileSize} bytes (${fileSizeMB} MB), max size: ${maxSize} bytes`);

        if (fileSize > maxSize) {
            throw permanent(`Audio file ${audioFile} is ${fileSizeMB} MB (${fileSize} bytes), over the limit of ${maxSize} bytes`);
        }
        if (fileSize === 0) {
            throw permanent(`Audio file ${audioFile} is empty`);
        }

        const audioStream = await storage.readStream(audioFile);
        const startTime = Date.now();
        const response = await api.create({
            model: config.model,
            file: audioStream,
            response_format: 'json',
            ...(config.language ? { language: config.language } : {}),
            ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
            ...(config.prompt ? { prompt: config.prompt } : {}),
        });
        const duration = Date.now() - startTime;

        logger.debug('Transcription complete', { duration, model: config.model });

        return {
            text: response.text,
            model: config.model,
            duration,
        };
    };

    return {
        transcribe,
    };
};
