import { CardClassifierService, normalizeLabel } from '../services/CardClassifierService';
import { UNKNOWN_RESULT } from '../types/captcha';
import { solidImage } from './helpers/images';

function createHttp() {
    return {
        get: jest.fn().mockResolvedValue({ data: { status: 'ok' } }),
        post: jest.fn(),
    };
}

const card = solidImage(4, 4, [220, 20, 20]);

describe('normalizeLabel', () => {
    it('aceita rótulos do conjunto fechado sem diferenciar maiúsculas', () => {
        expect(normalizeLabel(' Hearts ')).toBe('hearts');
        expect(normalizeLabel('KING')).toBe('king');
        expect(normalizeLabel('red')).toBe('red');
    });

    it('resolve apelidos curtos e numéricos', () => {
        expect(normalizeLabel('A')).toBe('ace');
        expect(normalizeLabel('10')).toBe('ten');
        expect(normalizeLabel('q')).toBe('queen');
        expect(normalizeLabel('spade')).toBe('spades');
    });

    it('fora do conjunto vira null', () => {
        expect(normalizeLabel('joker')).toBeNull();
        expect(normalizeLabel('unknown')).toBeNull();
    });
});

describe('CardClassifierService', () => {
    it('sem cliente HTTP fica desativado e responde unknown', async () => {
        const service = new CardClassifierService(null);

        await expect(service.initialize()).resolves.toBe(false);
        await expect(service.classify(card)).resolves.toEqual(UNKNOWN_RESULT);
        expect(service.isEnabled()).toBe(false);
    });

    it('envia a imagem em PNG base64 e normaliza o rótulo', async () => {
        const http = createHttp();
        http.post.mockResolvedValue({ data: { label: 'K', confidence: 0.93 } });
        const service = new CardClassifierService(http);

        await expect(service.classify(card)).resolves.toEqual({ label: 'king', confidence: 0.93 });

        expect(http.get).toHaveBeenCalledWith('/health');
        expect(http.post).toHaveBeenCalledWith('/predict', { image: expect.any(String) });
        const [, body] = http.post.mock.calls[0];
        // Assinatura PNG em base64
        expect(body.image.startsWith('iVBORw0KGgo')).toBe(true);
    });

    it('rótulo fora do conjunto vira unknown', async () => {
        const http = createHttp();
        http.post.mockResolvedValue({ data: { label: 'joker', confidence: 0.99 } });

        await expect(new CardClassifierService(http).classify(card)).resolves.toEqual(UNKNOWN_RESULT);
    });

    it('resposta fora do formato vira unknown', async () => {
        const http = createHttp();
        http.post.mockResolvedValue({ data: { label: 'ace', confidence: 2 } });

        await expect(new CardClassifierService(http).classify(card)).resolves.toEqual(UNKNOWN_RESULT);
    });

    it('confiança abaixo do mínimo vira unknown', async () => {
        const http = createHttp();
        http.post.mockResolvedValue({ data: { label: 'ace', confidence: 0.4 } });

        await expect(new CardClassifierService(http, 0.5).classify(card)).resolves.toEqual(UNKNOWN_RESULT);
    });

    it('erro na chamada vira unknown', async () => {
        const http = createHttp();
        http.post.mockRejectedValue(new Error('timeout of 5000ms exceeded'));

        await expect(new CardClassifierService(http).classify(card)).resolves.toEqual(UNKNOWN_RESULT);
    });

    it('health check com falha desativa o serviço uma única vez', async () => {
        const http = createHttp();
        http.get.mockRejectedValue(new Error('connect ECONNREFUSED'));
        const service = new CardClassifierService(http);

        await expect(service.classify(card)).resolves.toEqual(UNKNOWN_RESULT);
        await expect(service.classify(card)).resolves.toEqual(UNKNOWN_RESULT);

        expect(http.get).toHaveBeenCalledTimes(1);
        expect(http.post).not.toHaveBeenCalled();
        expect(service.isEnabled()).toBe(false);
    });
});
