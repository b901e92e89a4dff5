/**
 * SEGMENTAÇÃO DO CAPTCHA DE CARTAS
 *
 * - A imagem da pergunta traz duas cartas lado a lado: corta na metade
 * - A linha de respostas tem seis cartas, cada uma em seu próprio <img>
 */

import type { CandidateCard, CapturedImage, QuestionPair, Viewport } from '../types/captcha';
import { assertImage, cropColumns } from './card-image';
import { ElementNotFoundError, InvalidImageError } from './errors';

export async function split(questionImage: CapturedImage): Promise<QuestionPair> {
    assertImage(questionImage);
    if (questionImage.width < 2) {
        throw new InvalidImageError(`Imagem da pergunta estreita demais: ${questionImage.width}px`);
    }

    const mid = Math.floor(questionImage.width / 2);

    const [left, right] = await Promise.all([
        cropColumns(questionImage, 0, mid),
        cropColumns(questionImage, mid, questionImage.width - mid),
    ]);
    return { left, right };
}

/**
 * Captura as cartas candidatas na ordem dos seletores.
 * O índice (1..n) corresponde à posição fixa na tela e é usado no desempate.
 */
export async function extractCandidates<TElement>(
    viewport: Viewport<TElement>,
    locators: readonly string[],
): Promise<CandidateCard<TElement>[]> {
    const candidates: CandidateCard<TElement>[] = [];

    for (const [position, selector] of locators.entries()) {
        const element = await viewport.locateElement(selector);
        if (element === null) {
            throw new ElementNotFoundError(selector);
        }

        const image = await viewport.captureRegion(element);
        assertImage(image);
        candidates.push({ index: position + 1, image, element });
    }

    return candidates;
}
