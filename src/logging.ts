import winston from 'winston';
import { PROGRAM_NAME } from '@/constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createFormat = (level: LogLevel): winston.Logform.Format => {
    if (level === 'info' || level === 'warn' || level === 'error') {
        return winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => `${message}`),
        );
    }

    return winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
            const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} ${level}: ${message}${metaString}`;
        }),
    );
};

const createLogger = (level: LogLevel): winston.Logger => {
    return winston.createLogger({
        level,
        format: createFormat(level),
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console({
                // Everything goes to stderr so stdout stays usable for command output
                stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
            }),
        ],
    });
};

let logger: winston.Logger = createLogger('info');

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
