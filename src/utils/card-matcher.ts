/**
 * RESOLUÇÃO DO PAR DE CARTAS
 *
 * Estratégia 1 (rótulos): varredura gulosa na ordem das posições, primeira
 * carta com o rótulo pendente fica com a vaga. Empates vão para o menor índice.
 *
 * Estratégia 2 (sobreposição): quando algum rótulo da pergunta é "unknown" ou
 * os rótulos não preenchem as duas vagas, escolhe o argmax de similaridade para
 * cada metade. Se as duas metades apontarem para a mesma carta, a esquerda fica
 * com ela e a direita pega a melhor entre as restantes.
 */

import type {
    CapturedImage,
    CardLabel,
    LabeledCandidate,
    LabeledImage,
    MatchAssignment,
} from '../types/captcha';
import { UNKNOWN_LABEL } from '../types/captcha';
import { similarity } from './card-similarity';

type Slot = 'left' | 'right';

export interface LabelMatch {
    left?: number;
    right?: number;
}

export interface QuestionLabels {
    left: LabeledImage;
    right: LabeledImage;
}

export type SimilarityScorer = (questionHalf: CapturedImage, candidate: CapturedImage) => Promise<number>;

export function matchByLabel(
    leftLabel: CardLabel,
    rightLabel: CardLabel,
    candidates: ReadonlyArray<{ index: number; label: CardLabel }>,
): LabelMatch {
    const result: LabelMatch = {};
    const pending: Array<{ slot: Slot; label: CardLabel }> = [
        { slot: 'left', label: leftLabel },
        { slot: 'right', label: rightLabel },
    ].filter((entry): entry is { slot: Slot; label: CardLabel } => entry.label !== UNKNOWN_LABEL);

    for (const candidate of candidates) {
        if (pending.length === 0) break;

        const hit = pending.findIndex((entry) => entry.label === candidate.label);
        if (hit === -1) continue;

        result[pending[hit].slot] = candidate.index;
        pending.splice(hit, 1);
    }

    return result;
}

function argmax(scores: readonly number[], excluded?: number): number {
    let best = -1;
    for (let i = 0; i < scores.length; i++) {
        if (i === excluded) continue;
        if (best === -1 || scores[i] > scores[best]) best = i;
    }
    return best;
}

/**
 * Escolhe as posições (base 0) a partir das listas de similaridade.
 * Em caso de colisão a esquerda mantém a escolha.
 */
export function matchBySimilarity(
    leftScores: readonly number[],
    rightScores: readonly number[],
): { left: number; right: number } {
    if (leftScores.length < 2 || leftScores.length !== rightScores.length) {
        throw new RangeError(
            `Listas de similaridade inválidas (${leftScores.length}/${rightScores.length})`,
        );
    }

    const left = argmax(leftScores);
    let right = argmax(rightScores);

    if (left === right) {
        right = argmax(rightScores, left);
    }

    return { left, right };
}

async function scoreAll(
    half: CapturedImage,
    candidates: readonly LabeledCandidate[],
    scorer: SimilarityScorer,
): Promise<number[]> {
    const scores: number[] = [];
    for (const candidate of candidates) {
        scores.push(await scorer(half, candidate.image));
    }
    return scores;
}

export async function match(
    question: QuestionLabels,
    candidates: readonly LabeledCandidate[],
    scorer: SimilarityScorer = similarity,
): Promise<MatchAssignment> {
    if (candidates.length < 2) {
        throw new RangeError(`São necessárias ao menos 2 cartas candidatas (recebidas ${candidates.length})`);
    }

    const labelsKnown = question.left.label !== UNKNOWN_LABEL && question.right.label !== UNKNOWN_LABEL;

    if (labelsKnown) {
        const byLabel = matchByLabel(question.left.label, question.right.label, candidates);
        if (byLabel.left !== undefined && byLabel.right !== undefined) {
            return { left: byLabel.left, right: byLabel.right, strategy: 'label' };
        }
    }

    const leftScores = await scoreAll(question.left.image, candidates, scorer);
    const rightScores = await scoreAll(question.right.image, candidates, scorer);
    const picked = matchBySimilarity(leftScores, rightScores);

    return {
        left: candidates[picked.left].index,
        right: candidates[picked.right].index,
        strategy: 'similarity',
    };
}
