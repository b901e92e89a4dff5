import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import config from '../config';
import logger from '../utils/logger';
import { encodePng } from '../utils/card-image';
import { errorMessage } from '../utils/errors';
import {
    CapturedImage,
    CardClassifier,
    CardLabel,
    ClassificationResult,
    COLOR_LABELS,
    RANK_LABELS,
    SUIT_LABELS,
    UnknownLabel,
    UNKNOWN_RESULT,
} from '../types/captcha';

/** Parte do cliente axios usada pelo classificador */
export type InferenceHttpClient = Pick<AxiosInstance, 'get' | 'post'>;

const predictionSchema = z.object({
    label: z.string().min(1),
    confidence: z.number().min(0).max(1),
});

const KNOWN_LABELS: ReadonlySet<string> = new Set<string>([...RANK_LABELS, ...SUIT_LABELS, ...COLOR_LABELS]);

// Rótulos curtos/numéricos que o modelo às vezes devolve
const LABEL_ALIASES: Record<string, string> = {
    a: 'ace',
    '1': 'ace',
    '2': 'two',
    '3': 'three',
    '4': 'four',
    '5': 'five',
    '6': 'six',
    '7': 'seven',
    '8': 'eight',
    '9': 'nine',
    '10': 'ten',
    j: 'jack',
    q: 'queen',
    k: 'king',
    club: 'clubs',
    diamond: 'diamonds',
    heart: 'hearts',
    spade: 'spades',
};

function isKnownLabel(value: string): value is Exclude<CardLabel, UnknownLabel> {
    return KNOWN_LABELS.has(value);
}

/** Normaliza o rótulo bruto do modelo; fora do conjunto fechado vira null */
export function normalizeLabel(raw: string): Exclude<CardLabel, UnknownLabel> | null {
    const cleaned = raw.trim().toLowerCase();
    const resolved = LABEL_ALIASES[cleaned] ?? cleaned;
    return isKnownLabel(resolved) ? resolved : null;
}

/**
 * Classificador visual de cartas.
 * Consulta um serviço HTTP de inferência; qualquer falha resulta em "unknown",
 * o que leva o matcher para a estratégia de similaridade.
 */
export class CardClassifierService implements CardClassifier {
    private enabled: boolean;
    private initialized = false;

    constructor(
        private readonly http: InferenceHttpClient | null,
        private readonly minConfidence = 0,
    ) {
        this.enabled = http !== null;
    }

    /**
     * Verifica uma única vez se o serviço responde.
     * Se não responder, o classificador fica desativado até o fim do processo.
     */
    async initialize(): Promise<boolean> {
        if (this.initialized) return this.enabled;
        this.initialized = true;

        if (this.http === null) {
            logger.warn('[CardClassifier] Endpoint não configurado, usando apenas cor/similaridade');
            return false;
        }

        try {
            await this.http.get('/health');
            logger.info('[CardClassifier] Serviço de inferência disponível');
        } catch (error) {
            this.enabled = false;
            logger.warn(`[CardClassifier] Serviço indisponível, desativado: ${errorMessage(error)}`);
        }

        return this.enabled;
    }

    isEnabled(): boolean {
        return this.enabled;
    }

    async classify(image: CapturedImage): Promise<ClassificationResult> {
        if (!this.initialized) {
            await this.initialize();
        }
        if (!this.enabled || this.http === null) {
            return UNKNOWN_RESULT;
        }

        try {
            const png = await encodePng(image);
            const response = await this.http.post('/predict', { image: png.toString('base64') });

            const parsed = predictionSchema.safeParse(response.data);
            if (!parsed.success) {
                logger.warn(`[CardClassifier] Resposta inválida: ${parsed.error.message}`);
                return UNKNOWN_RESULT;
            }

            const label = normalizeLabel(parsed.data.label);
            if (label === null) {
                logger.debug(`[CardClassifier] Rótulo fora do conjunto: "${parsed.data.label}"`);
                return UNKNOWN_RESULT;
            }

            if (parsed.data.confidence < this.minConfidence) {
                logger.debug(`[CardClassifier] Confiança baixa para "${label}": ${parsed.data.confidence}`);
                return UNKNOWN_RESULT;
            }

            return { label, confidence: parsed.data.confidence };
        } catch (error) {
            logger.warn(`[CardClassifier] Falha na classificação: ${errorMessage(error)}`);
            return UNKNOWN_RESULT;
        }
    }
}

function createHttpClient(): InferenceHttpClient | null {
    if (!config.classifier.endpoint) return null;
    return axios.create({
        baseURL: config.classifier.endpoint,
        timeout: config.classifier.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
    });
}

export default new CardClassifierService(createHttpClient(), config.classifier.minConfidence);
