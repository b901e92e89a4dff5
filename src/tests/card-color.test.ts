import { analyzeColor, classifyColor } from '../utils/card-color';
import { imageFrom, solidImage } from './helpers/images';

describe('classifyColor', () => {
    it('carta vermelha', () => {
        expect(classifyColor(solidImage(8, 8, [220, 20, 20]))).toBe('red');
    });

    it('vermelho na faixa alta de matiz (magenta escuro)', () => {
        expect(classifyColor(solidImage(8, 8, [220, 20, 120]))).toBe('red');
    });

    it('carta preta', () => {
        expect(classifyColor(solidImage(8, 8, [30, 30, 30]))).toBe('black');
    });

    it('carta em branco não tem conteúdo: unknown', () => {
        expect(classifyColor(solidImage(8, 8, [255, 255, 255]))).toBe('unknown');
    });

    it('respeita a ordem bgr', () => {
        expect(classifyColor(solidImage(8, 8, [20, 20, 220], 'bgr'))).toBe('red');
        expect(classifyColor(solidImage(8, 8, [20, 20, 220], 'rgb'))).toBe('black');
    });

    it('exige mais de 20% de pixels vermelhos', () => {
        const twoRed = imageFrom(10, 1, (x) => (x < 2 ? [220, 20, 20] : [30, 30, 30]));
        const threeRed = imageFrom(10, 1, (x) => (x < 3 ? [220, 20, 20] : [30, 30, 30]));

        expect(classifyColor(twoRed)).toBe('black');
        expect(classifyColor(threeRed)).toBe('red');
    });

    it('fundo claro não entra na conta', () => {
        const image = imageFrom(10, 1, (x) => (x < 2 ? [220, 20, 20] : [250, 250, 250]));

        expect(analyzeColor(image)).toEqual({ redPixels: 2, contentPixels: 2, redRatio: 1 });
        expect(classifyColor(image)).toBe('red');
    });

    it('vermelho pouco saturado conta como preto', () => {
        // S = 255 * 40 / 160 = 64 (< 70)
        expect(classifyColor(solidImage(4, 4, [160, 120, 120]))).toBe('black');
    });
});
