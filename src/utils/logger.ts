import fs from 'fs';
import path from 'path';
import winston from 'winston';
import config from '../config';

export interface LoggerOptions {
    env: string;
    level?: string;
    logDir: string;
}

const format = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.colorize({ all: true }),
    winston.format.printf((info) => `${info.timestamp} ${info.level}: ${info.message}`),
);

function fileTransport(filename: string, level?: string): winston.transport {
    const transport = new winston.transports.File({ filename, level });
    transport.on('error', (error: Error) => {
        console.warn(`[Logger] Falha ao gravar ${filename}: ${error.message}`);
    });
    return transport;
}

/**
 * Console sempre; em test fica mudo e não cria arquivos.
 * Fora de test grava logs/error.log e logs/all.log.
 */
export function createAppLogger({ env, level, logDir }: LoggerOptions): winston.Logger {
    const isTest = env === 'test';
    const transports: winston.transport[] = [new winston.transports.Console()];

    if (!isTest) {
        try {
            fs.mkdirSync(logDir, { recursive: true });
            transports.push(
                fileTransport(path.join(logDir, 'error.log'), 'error'),
                fileTransport(path.join(logDir, 'all.log')),
            );
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.warn(`[Logger] Sem logs em arquivo (${logDir}): ${reason}`);
        }
    }

    return winston.createLogger({
        level: level || (env === 'development' ? 'debug' : 'warn'),
        levels: winston.config.npm.levels,
        format,
        transports,
        silent: isTest,
    });
}

const logger = createAppLogger({ env: config.env, level: config.log.level, logDir: config.log.dir });

export default logger;
