import fs from 'fs/promises';
import path from 'path';
import config from '../config';
import logger from './logger';
import type { CapturedImage, DebugImageSink } from '../types/captcha';
import { encodePng } from './card-image';
import { errorMessage } from './errors';

/**
 * Evidências de depuração do CAPTCHA: <debugDir>/attempt-<n>/<nome>.png
 * Erros de disco viram warning e nunca interrompem a tentativa.
 */
export class DebugImageStore implements DebugImageSink {
    constructor(private readonly baseDir: string) {}

    async save(attempt: number, name: string, image: CapturedImage): Promise<void> {
        try {
            const dir = path.join(this.baseDir, `attempt-${attempt}`);
            await fs.mkdir(dir, { recursive: true });

            const fileName = `${name.replace(/[^A-Za-z0-9_-]/g, '_')}.png`;
            await fs.writeFile(path.join(dir, fileName), await encodePng(image));
        } catch (error) {
            logger.warn(`[CaptchaDebug] Erro ao salvar ${name} (não crítico): ${errorMessage(error)}`);
        }
    }

    async cleanup(): Promise<void> {
        try {
            await fs.rm(this.baseDir, { recursive: true, force: true });
            logger.debug(`[CaptchaDebug] Imagens removidas de ${this.baseDir}`);
        } catch (error) {
            logger.warn(`[CaptchaDebug] Erro ao limpar ${this.baseDir}: ${errorMessage(error)}`);
        }
    }
}

export default new DebugImageStore(config.captcha.debugDir);
