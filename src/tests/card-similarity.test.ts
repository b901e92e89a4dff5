import { similarity } from '../utils/card-similarity';
import { InvalidImageError } from '../utils/errors';
import { imageFrom, solidImage } from './helpers/images';

describe('similarity', () => {
    it('imagens iguais valem 1', async () => {
        const card = imageFrom(6, 4, (x, y) => ((x + y) % 2 === 0 ? [255, 255, 255] : [0, 0, 0]));

        await expect(similarity(card, card)).resolves.toBe(1);
    });

    it('imagens opostas valem 0', async () => {
        await expect(similarity(solidImage(4, 4, [255, 255, 255]), solidImage(4, 4, [0, 0, 0]))).resolves.toBe(0);
    });

    it('metade diferente vale 0.5', async () => {
        const half = imageFrom(4, 2, (x) => (x < 2 ? [255, 255, 255] : [0, 0, 0]));

        await expect(similarity(half, solidImage(4, 2, [255, 255, 255]))).resolves.toBe(0.5);
    });

    it('a candidata é redimensionada para o tamanho da metade', async () => {
        const white = solidImage(4, 4, [255, 255, 255]);

        await expect(similarity(white, solidImage(8, 12, [255, 255, 255]))).resolves.toBe(1);
        await expect(similarity(white, solidImage(2, 3, [0, 0, 0]))).resolves.toBe(0);
    });

    it('binariza em cinza > 127', async () => {
        await expect(similarity(solidImage(2, 2, [127, 127, 127]), solidImage(2, 2, [0, 0, 0]))).resolves.toBe(1);
        await expect(similarity(solidImage(2, 2, [128, 128, 128]), solidImage(2, 2, [0, 0, 0]))).resolves.toBe(0);
    });

    it('rejeita imagem inválida', async () => {
        const broken = { width: 0, height: 2, channelOrder: 'rgb' as const, data: Buffer.alloc(0) };

        await expect(similarity(broken, solidImage(2, 2, [0, 0, 0]))).rejects.toThrow(InvalidImageError);
    });
});
