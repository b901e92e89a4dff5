import type { CapturedImage } from '../types/captcha';
import { assertImage, binarize, resizeImage, toGrayscale } from './card-image';

const BINARY_THRESHOLD = 127;

/**
 * Razão de sobreposição entre duas cartas (0.0 a 1.0).
 *
 * A candidata é redimensionada (sharp) para o tamanho da metade da pergunta,
 * ambas são binarizadas (cinza > 127) e o resultado é 1 - fração de pixels
 * diferentes.
 */
export async function similarity(questionHalf: CapturedImage, candidate: CapturedImage): Promise<number> {
    assertImage(questionHalf);
    assertImage(candidate);

    const reference = binarize(toGrayscale(questionHalf), BINARY_THRESHOLD);
    const resized = await resizeImage(candidate, questionHalf.width, questionHalf.height);
    const other = binarize(toGrayscale(resized), BINARY_THRESHOLD);

    let differing = 0;
    for (let i = 0; i < reference.length; i++) {
        if (reference[i] !== other[i]) differing++;
    }

    return 1 - differing / reference.length;
}
