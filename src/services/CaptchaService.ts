/**
 * CAPTCHA SERVICE
 *
 * Resolve o desafio de cartas do portal:
 * 1. Captura a imagem da pergunta (duas cartas) e as seis candidatas
 * 2. Classifica (modelo visual, com fallback de cor por metade)
 * 3. Escolhe o par (rótulos ou similaridade) e clica esquerda -> direita -> confirmar
 * 4. Sem alert após o envio = resolvido; alert = rejeitado, nova tentativa
 */

import config, { CaptchaSelectors } from '../config';
import logger from '../utils/logger';
import { extractCandidates, split } from '../utils/card-segmenter';
import { classifyColor } from '../utils/card-color';
import { match } from '../utils/card-matcher';
import {
    ElementNotFoundError,
    UnexpectedModalError,
    ViewportLostError,
    errorMessage,
} from '../utils/errors';
import captchaErrorLog from '../utils/captchaErrorLog';
import debugImages from '../utils/debugImages';
import cardClassifier from './CardClassifierService';
import type {
    AttemptOutcome,
    CandidateCard,
    CapturedImage,
    CaptchaErrorSink,
    CardClassifier,
    DebugImageSink,
    LabeledCandidate,
    LabeledImage,
    MatchAssignment,
    QuestionPair,
    SolveState,
    Viewport,
} from '../types/captcha';
import { UNKNOWN_LABEL } from '../types/captcha';

export interface CaptchaSolverOptions {
    maxAttempts: number;
    elementTimeoutMs: number;
    alertTimeoutMs: number;
    retryDelayMs: number;
    selectors: CaptchaSelectors;
}

export interface SolveOptions {
    maxAttempts?: number;
    /** Verificado no início de cada tentativa; a tentativa em curso sempre termina */
    signal?: AbortSignal;
}

export interface HandleChallengeOptions extends SolveOptions {
    keepDebugImages?: boolean;
}

interface CapturedChallenge<TElement> {
    question: QuestionPair;
    candidates: CandidateCard<TElement>[];
}

export class CaptchaService {
    private state: SolveState = 'Idle';

    constructor(
        private readonly classifier: CardClassifier,
        private readonly debugSink: DebugImageSink,
        private readonly errorSink: CaptchaErrorSink,
        private readonly options: CaptchaSolverOptions,
    ) {}

    /** Último estado alcançado pela máquina de tentativas */
    getState(): SolveState {
        return this.state;
    }

    async isChallengePresent<TElement>(viewport: Viewport<TElement>): Promise<boolean> {
        const marker = await viewport.locateElement(this.options.selectors.challengeMarker);
        return marker !== null;
    }

    /**
     * Resolve o desafio com no máximo `maxAttempts` tentativas.
     * Rejeição e esgotamento retornam false; só ViewportLostError sobe.
     */
    async solve<TElement>(viewport: Viewport<TElement>, options: SolveOptions = {}): Promise<boolean> {
        const maxAttempts = options.maxAttempts ?? this.options.maxAttempts;
        if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
            throw new RangeError(`maxAttempts inválido: ${maxAttempts}`);
        }

        logger.info(`[CaptchaService] Iniciando resolução (máx. ${maxAttempts} tentativas)`);

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (options.signal?.aborted) {
                logger.warn(`[CaptchaService] Resolução cancelada antes da tentativa ${attempt}`);
                this.state = 'Exhausted';
                return false;
            }

            logger.info(`[CaptchaService] Tentativa ${attempt}/${maxAttempts}...`);
            const outcome = await this.runAttempt(viewport, attempt);

            if (outcome.kind === 'Submitted') {
                this.state = 'Success';
                logger.info(`[CaptchaService] CAPTCHA resolvido na tentativa ${attempt}`);
                return true;
            }

            if (outcome.kind === 'RejectedWithAlert') {
                logger.info(`[CaptchaService] Resposta rejeitada: ${outcome.detail ?? '(sem texto)'}`);
            } else {
                this.errorSink.record(attempt, outcome.detail, outcome.error);
            }

            if (attempt < maxAttempts) {
                await this.delay(this.options.retryDelayMs);
            }
        }

        this.state = 'Exhausted';
        logger.warn(`[CaptchaService] Tentativas esgotadas (${maxAttempts})`);
        return false;
    }

    /**
     * Usado pelo scraper: sem desafio na página retorna true direto.
     * As imagens de depuração são apagadas ao final, salvo keepDebugImages.
     */
    async handleChallenge<TElement>(
        viewport: Viewport<TElement>,
        options: HandleChallengeOptions = {},
    ): Promise<boolean> {
        if (!(await this.isChallengePresent(viewport))) {
            return true;
        }

        logger.info('[CaptchaService] Página de verificação detectada');

        try {
            return await this.solve(viewport, options);
        } finally {
            if (!options.keepDebugImages) {
                await this.debugSink.cleanup();
            }
        }
    }

    private async runAttempt<TElement>(viewport: Viewport<TElement>, attempt: number): Promise<AttemptOutcome> {
        this.state = 'Capturing';

        let challenge: CapturedChallenge<TElement>;
        try {
            challenge = await this.capture(viewport);
        } catch (error) {
            if (error instanceof ViewportLostError) throw error;
            return { kind: 'Error', detail: `Falha na captura: ${errorMessage(error)}`, error };
        }

        try {
            await this.saveDebug(attempt, challenge);

            this.state = 'Classifying';
            const { left, right, candidates } = await this.classify(challenge);

            this.state = 'Matching';
            const assignment = await match({ left, right }, candidates);
            logger.info(
                `[CaptchaService] Par escolhido: esquerda=${assignment.left}, direita=${assignment.right} (${assignment.strategy})`,
            );

            this.state = 'Submitting';
            await this.submit(viewport, challenge.candidates, assignment);

            this.state = 'AwaitingAlert';
            return await this.observeResult(viewport);
        } catch (error) {
            if (error instanceof ViewportLostError) throw error;
            if (error instanceof UnexpectedModalError) {
                return this.consumeAlert(viewport, error.alertText);
            }
            return { kind: 'Error', detail: `${this.state}: ${errorMessage(error)}`, error };
        }
    }

    private async capture<TElement>(viewport: Viewport<TElement>): Promise<CapturedChallenge<TElement>> {
        const { selectors, elementTimeoutMs } = this.options;

        const question = await this.retryOnce('pergunta', async () => {
            const ready = await viewport.waitForCondition(
                async () => (await viewport.locateElement(selectors.question)) !== null,
                elementTimeoutMs,
            );
            const element = ready ? await viewport.locateElement(selectors.question) : null;
            if (element === null) {
                throw new ElementNotFoundError(selectors.question);
            }
            return split(await viewport.captureRegion(element));
        });

        const candidates = await this.retryOnce('candidatas', () =>
            extractCandidates(viewport, selectors.candidates),
        );

        return { question, candidates };
    }

    /** Falhas transitórias de captura ganham uma segunda chance imediata */
    private async retryOnce<T>(step: string, action: () => Promise<T>): Promise<T> {
        try {
            return await action();
        } catch (error) {
            if (error instanceof ViewportLostError) throw error;
            logger.debug(`[CaptchaService] Captura de ${step} falhou, repetindo: ${errorMessage(error)}`);
            return action();
        }
    }

    private async classify<TElement>(
        challenge: CapturedChallenge<TElement>,
    ): Promise<{ left: LabeledImage; right: LabeledImage; candidates: LabeledCandidate[] }> {
        const left = await this.classifyHalf('esquerda', challenge.question.left);
        const right = await this.classifyHalf('direita', challenge.question.right);

        const candidates: LabeledCandidate[] = [];
        for (const card of challenge.candidates) {
            const result = await this.classifier.classify(card.image);
            candidates.push({ index: card.index, label: result.label, image: card.image });
        }

        logger.debug(
            `[CaptchaService] Rótulos: ${left.label}/${right.label} | ` +
                candidates.map((c) => `${c.index}:${c.label}`).join(' '),
        );

        return { left, right, candidates };
    }

    private async classifyHalf(side: string, image: CapturedImage): Promise<LabeledImage> {
        const result = await this.classifier.classify(image);
        if (result.label !== UNKNOWN_LABEL) {
            return { label: result.label, image };
        }

        const color = classifyColor(image);
        logger.debug(`[CaptchaService] Metade ${side} sem rótulo visual, cor: ${color}`);
        return { label: color, image };
    }

    private async submit<TElement>(
        viewport: Viewport<TElement>,
        candidates: CandidateCard<TElement>[],
        assignment: MatchAssignment,
    ): Promise<void> {
        for (const index of [assignment.left, assignment.right]) {
            const card = candidates.find((c) => c.index === index);
            if (!card) {
                throw new RangeError(`Carta ${index} não existe entre as candidatas`);
            }
            await viewport.click(card.element);
        }

        const confirm = await viewport.locateElement(this.options.selectors.confirm);
        if (confirm === null) {
            throw new ElementNotFoundError(this.options.selectors.confirm);
        }
        await viewport.click(confirm);
    }

    private async observeResult<TElement>(viewport: Viewport<TElement>): Promise<AttemptOutcome> {
        const alerted = await viewport.waitForCondition(
            async () => (await viewport.currentAlertText()) !== null,
            this.options.alertTimeoutMs,
        );

        if (!alerted) {
            return { kind: 'Submitted' };
        }

        const text = await viewport.currentAlertText();
        return this.consumeAlert(viewport, text ?? '');
    }

    private async consumeAlert<TElement>(viewport: Viewport<TElement>, text: string): Promise<AttemptOutcome> {
        try {
            await viewport.dismissAlert();
        } catch (error) {
            if (error instanceof ViewportLostError) throw error;
            return { kind: 'Error', detail: `Falha ao fechar alert "${text}": ${errorMessage(error)}`, error };
        }
        return { kind: 'RejectedWithAlert', detail: text };
    }

    private async saveDebug<TElement>(attempt: number, challenge: CapturedChallenge<TElement>): Promise<void> {
        await this.debugSink.save(attempt, 'question-left', challenge.question.left);
        await this.debugSink.save(attempt, 'question-right', challenge.question.right);
        for (const card of challenge.candidates) {
            await this.debugSink.save(attempt, `candidate-${card.index}`, card.image);
        }
    }

    private delay(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

export default new CaptchaService(cardClassifier, debugImages, captchaErrorLog, {
    maxAttempts: config.captcha.maxAttempts,
    elementTimeoutMs: config.captcha.elementTimeoutMs,
    alertTimeoutMs: config.captcha.alertTimeoutMs,
    retryDelayMs: config.captcha.retryDelayMs,
    selectors: config.captcha.selectors,
});
