/**
 * Log de erros do solver de CAPTCHA
 *
 * Uma linha JSON por tentativa que falhou, com rotação por tamanho.
 * Falhas de escrita só geram warning: o solver não para por causa do log.
 */

import fs from 'fs';
import path from 'path';
import config from '../config';
import logger from './logger';
import type { CaptchaErrorSink } from '../types/captcha';
import { CaptchaError, errorMessage } from './errors';

interface CaptchaErrorEntry {
    timestamp: string;
    attempt: number;
    detail: string;
    code?: string;
    error?: string;
    stack?: string;
}

export interface CaptchaErrorLogOptions {
    maxFileSize?: number;
    maxFiles?: number;
}

export class CaptchaErrorLog implements CaptchaErrorSink {
    private readonly maxFileSize: number;
    private readonly maxFiles: number;

    constructor(
        private readonly logFile: string,
        options: CaptchaErrorLogOptions = {},
    ) {
        this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024; // 10MB
        this.maxFiles = options.maxFiles ?? 5;
    }

    record(attempt: number, detail: string, error?: unknown): void {
        const entry: CaptchaErrorEntry = {
            timestamp: new Date().toISOString(),
            attempt,
            detail,
        };
        if (error instanceof CaptchaError) entry.code = error.code;
        if (error !== undefined) entry.error = errorMessage(error);
        if (error instanceof Error && error.stack) entry.stack = error.stack;

        logger.warn(`[Captcha] Tentativa ${attempt} falhou: ${detail}`);

        try {
            fs.mkdirSync(path.dirname(this.logFile), { recursive: true });

            if (fs.existsSync(this.logFile) && fs.statSync(this.logFile).size > this.maxFileSize) {
                this.rotateLogs();
            }

            fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
        } catch (writeError) {
            logger.warn(`[Captcha] Não foi possível gravar ${this.logFile}: ${errorMessage(writeError)}`);
        }
    }

    /** captcha-errors.log -> .1 -> .2 ... o mais antigo é descartado */
    private rotateLogs(): void {
        const oldest = `${this.logFile}.${this.maxFiles}`;
        if (fs.existsSync(oldest)) {
            fs.unlinkSync(oldest);
        }

        for (let i = this.maxFiles - 1; i >= 1; i--) {
            const oldFile = `${this.logFile}.${i}`;
            if (fs.existsSync(oldFile)) {
                fs.renameSync(oldFile, `${this.logFile}.${i + 1}`);
            }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
    }
}

export default new CaptchaErrorLog(config.captcha.errorLogPath);
