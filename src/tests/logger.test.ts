import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import { createAppLogger } from '../utils/logger';

function fileNames(logger: winston.Logger): string[] {
    return logger.transports
        .filter(
            (transport): transport is winston.transports.FileTransportInstance =>
                transport instanceof winston.transports.File,
        )
        .map((transport) => transport.filename)
        .sort();
}

function closeLogger(logger: winston.Logger): Promise<void> {
    return new Promise((resolve) => {
        logger.on('finish', () => resolve());
        logger.end();
    });
}

describe('createAppLogger', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-logger-'));
    });

    afterEach(() => {
        jest.restoreAllMocks();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('em test fica mudo e não cria arquivos', () => {
        const logDir = path.join(tmpDir, 'logs');

        const logger = createAppLogger({ env: 'test', logDir });

        expect(logger.silent).toBe(true);
        expect(fileNames(logger)).toEqual([]);
        expect(fs.existsSync(logDir)).toBe(false);
    });

    it('nível padrão depende do ambiente', () => {
        expect(createAppLogger({ env: 'test', level: '', logDir: tmpDir }).level).toBe('warn');
        expect(createAppLogger({ env: 'test', level: 'http', logDir: tmpDir }).level).toBe('http');
    });

    it('development grava em debug nos dois arquivos', async () => {
        const logDir = path.join(tmpDir, 'logs');

        const logger = createAppLogger({ env: 'development', logDir });

        expect(logger.level).toBe('debug');
        expect(logger.silent).toBe(false);
        expect(fileNames(logger)).toEqual(['all.log', 'error.log']);
        expect(fs.existsSync(logDir)).toBe(true);
        await closeLogger(logger);
    });

    it('sem diretório gravável segue só com o console', () => {
        const blocker = path.join(tmpDir, 'arquivo');
        fs.writeFileSync(blocker, '');
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        const logger = createAppLogger({ env: 'production', level: 'info', logDir: path.join(blocker, 'logs') });

        expect(logger.level).toBe('info');
        expect(fileNames(logger)).toEqual([]);
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
