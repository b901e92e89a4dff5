/**
 * Abre a página de validação do portal e executa uma resolução do CAPTCHA de cartas.
 * Uso: node dist/scripts/solve-captcha.js [--headless] [--keep-debug] [--attempts N]
 */

import config from '../config';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import puppeteerService from '../services/PuppeteerService';
import cardClassifierService from '../services/CardClassifierService';
import captchaService from '../services/CaptchaService';

async function solveCaptcha(): Promise<boolean> {
    const args = process.argv.slice(2);
    const attemptsIndex = args.indexOf('--attempts');
    const maxAttempts = attemptsIndex >= 0 ? parseInt(args[attemptsIndex + 1] ?? '', 10) : config.captcha.maxAttempts;

    if (Number.isNaN(maxAttempts) || maxAttempts < 1) {
        throw new Error('--attempts deve ser um inteiro positivo');
    }

    await cardClassifierService.initialize();
    await puppeteerService.initialize({ headless: args.includes('--headless') });

    try {
        await puppeteerService.goto(config.portal.validateUrl);
        return await captchaService.handleChallenge(puppeteerService.getViewport(), {
            maxAttempts,
            keepDebugImages: args.includes('--keep-debug') || config.captcha.keepDebugImages,
        });
    } finally {
        await puppeteerService.close();
    }
}

solveCaptcha()
    .then((solved) => {
        logger.info(solved ? 'CAPTCHA resolvido' : 'CAPTCHA não resolvido');
        process.exit(solved ? 0 : 2);
    })
    .catch((error: unknown) => {
        logger.error(`Erro ao resolver CAPTCHA: ${errorMessage(error)}`);
        process.exit(1);
    });
