import { extractCandidates, split } from '../utils/card-segmenter';
import { ElementNotFoundError, InvalidImageError } from '../utils/errors';
import type { CapturedImage, Viewport } from '../types/captcha';
import { imageFrom, solidImage } from './helpers/images';

class ListViewport implements Viewport<string> {
    readonly captured: string[] = [];

    constructor(private readonly present: ReadonlySet<string>) {}

    async locateElement(selector: string): Promise<string | null> {
        return this.present.has(selector) ? `el:${selector}` : null;
    }

    async captureRegion(element: string): Promise<CapturedImage> {
        this.captured.push(element);
        return solidImage(2, 2, [element.length, 0, 0]);
    }

    async click(): Promise<void> {}

    async waitForCondition(predicate: () => Promise<boolean>): Promise<boolean> {
        return predicate();
    }

    async currentAlertText(): Promise<string | null> {
        return null;
    }

    async dismissAlert(): Promise<void> {}
}

describe('split', () => {
    it('corta a pergunta em duas metades de mesma altura', async () => {
        const image = imageFrom(200, 80, (x) => [x % 256, 0, 0]);

        const { left, right } = await split(image);

        expect([left.width, left.height]).toEqual([100, 80]);
        expect([right.width, right.height]).toEqual([100, 80]);
        expect(left.data[0]).toBe(0);
        expect(right.data[0]).toBe(100);
        expect(right.data[99 * 3]).toBe(199);
    });

    it('largura ímpar: a coluna extra fica na metade direita', async () => {
        const { left, right } = await split(solidImage(201, 10, [0, 0, 0]));

        expect(left.width).toBe(100);
        expect(right.width).toBe(101);
        expect(left.width + right.width).toBe(201);
    });

    it('mantém a ordem de canais da imagem original', async () => {
        const { left, right } = await split(solidImage(4, 2, [1, 2, 3], 'bgr'));

        expect(left.channelOrder).toBe('bgr');
        expect(right.channelOrder).toBe('bgr');
    });

    it('rejeita imagem com menos de 2 colunas', async () => {
        await expect(split(solidImage(1, 10, [0, 0, 0]))).rejects.toThrow(InvalidImageError);
    });

    it('rejeita buffer com tamanho incompatível', async () => {
        const broken: CapturedImage = { width: 4, height: 4, channelOrder: 'rgb', data: Buffer.alloc(10) };

        await expect(split(broken)).rejects.toThrow(InvalidImageError);
    });
});

describe('extractCandidates', () => {
    const locators = ['c1', 'c2', 'c3', 'c4', 'c5', 'c6'];

    it('captura na ordem dos seletores com índices 1..n', async () => {
        const viewport = new ListViewport(new Set(locators));

        const candidates = await extractCandidates(viewport, locators);

        expect(candidates.map((c) => c.index)).toEqual([1, 2, 3, 4, 5, 6]);
        expect(candidates.map((c) => c.element)).toEqual(locators.map((l) => `el:${l}`));
        expect(viewport.captured).toEqual(locators.map((l) => `el:${l}`));
    });

    it('falha com ElementNotFoundError quando um seletor não existe', async () => {
        const viewport = new ListViewport(new Set(['c1', 'c2', 'c3', 'c5', 'c6']));

        await expect(extractCandidates(viewport, locators)).rejects.toBeInstanceOf(ElementNotFoundError);
        expect(viewport.captured).toEqual(['el:c1', 'el:c2', 'el:c3']);
    });
});
