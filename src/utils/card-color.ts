import type { CapturedImage, ColorLabel, UnknownLabel } from '../types/captcha';
import { assertImage, toGrayscale, toHsv } from './card-image';

// Vermelho dá a volta no círculo de matiz: duas faixas (escala 0..180)
const RED_HUE_BANDS: ReadonlyArray<[number, number]> = [
    [0, 10],
    [160, 180],
];
const RED_MIN_SATURATION = 70;
const RED_MIN_VALUE = 50;

/** Pixels com cinza <= 200 contam como "tinta" sobre fundo claro */
const CONTENT_GRAY_THRESHOLD = 200;

/** Heurística calibrada para as cartas do portal */
export const RED_RATIO_THRESHOLD = 0.2;

export interface ColorAnalysis {
    redPixels: number;
    contentPixels: number;
    redRatio: number;
}

export function analyzeColor(image: CapturedImage): ColorAnalysis {
    assertImage(image);

    const { h, s, v } = toHsv(image);
    const gray = toGrayscale(image);

    let redPixels = 0;
    let contentPixels = 0;

    for (let p = 0; p < gray.length; p++) {
        const inRedBand = RED_HUE_BANDS.some(([low, high]) => h[p] >= low && h[p] <= high);
        if (inRedBand && s[p] >= RED_MIN_SATURATION && v[p] >= RED_MIN_VALUE) {
            redPixels++;
        }
        if (gray[p] <= CONTENT_GRAY_THRESHOLD) {
            contentPixels++;
        }
    }

    return {
        redPixels,
        contentPixels,
        redRatio: contentPixels > 0 ? redPixels / contentPixels : 0,
    };
}

/**
 * Classifica a carta como vermelha (copas/ouros) ou preta (paus/espadas).
 * Sem pixels de conteúdo (carta em branco) devolve "unknown".
 */
export function classifyColor(image: CapturedImage): ColorLabel | UnknownLabel {
    const { contentPixels, redRatio } = analyzeColor(image);

    if (contentPixels === 0) return 'unknown';
    return redRatio > RED_RATIO_THRESHOLD ? 'red' : 'black';
}
