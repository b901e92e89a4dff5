import sharp from 'sharp';
import type { CapturedImage } from '../types/captcha';
import { InvalidImageError } from './errors';

export const CHANNELS = 3;

/** Valida dimensões e tamanho do buffer antes de qualquer processamento */
export function assertImage(image: CapturedImage): void {
    if (!Number.isInteger(image.width) || !Number.isInteger(image.height) || image.width < 1 || image.height < 1) {
        throw new InvalidImageError(`Dimensões inválidas: ${image.width}x${image.height}`, {
            width: image.width,
            height: image.height,
        });
    }
    const expected = image.width * image.height * CHANNELS;
    if (image.data.length !== expected) {
        throw new InvalidImageError(`Buffer com ${image.data.length} bytes, esperado ${expected}`, {
            width: image.width,
            height: image.height,
        });
    }
}

/** Decodifica PNG/JPEG (screenshot) para RGB cru */
export async function decodeImage(encoded: Buffer): Promise<CapturedImage> {
    const { data, info } = await sharp(encoded)
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer({ resolveWithObject: true });

    if (info.channels !== CHANNELS) {
        throw new InvalidImageError(`Imagem decodificada com ${info.channels} canais`);
    }

    return { width: info.width, height: info.height, channelOrder: 'rgb', data };
}

/** Converte para a ordem de canais pedida (cópia quando precisa trocar) */
export function toChannelOrder(image: CapturedImage, order: CapturedImage['channelOrder']): CapturedImage {
    if (image.channelOrder === order) return image;

    const swapped = Buffer.alloc(image.data.length);
    for (let i = 0; i < image.data.length; i += CHANNELS) {
        swapped[i] = image.data[i + 2];
        swapped[i + 1] = image.data[i + 1];
        swapped[i + 2] = image.data[i];
    }
    return { ...image, channelOrder: order, data: swapped };
}

export async function encodePng(image: CapturedImage): Promise<Buffer> {
    assertImage(image);
    return rawInput(toChannelOrder(image, 'rgb')).png().toBuffer();
}

function rawInput(image: CapturedImage): sharp.Sharp {
    return sharp(image.data, {
        raw: { width: image.width, height: image.height, channels: CHANNELS },
    });
}

/** Recorta colunas [left, left + width) mantendo todas as linhas */
export async function cropColumns(image: CapturedImage, left: number, width: number): Promise<CapturedImage> {
    const { data, info } = await rawInput(image)
        .extract({ left, top: 0, width, height: image.height })
        .raw()
        .toBuffer({ resolveWithObject: true });

    return { width: info.width, height: info.height, channelOrder: image.channelOrder, data };
}

/** Redimensiona para width x height exatos, sem manter proporção */
export async function resizeImage(image: CapturedImage, width: number, height: number): Promise<CapturedImage> {
    if (image.width === width && image.height === height) return image;

    const { data, info } = await rawInput(image)
        .resize(width, height, { fit: 'fill' })
        .raw()
        .toBuffer({ resolveWithObject: true });

    return { width: info.width, height: info.height, channelOrder: image.channelOrder, data };
}

function rgbAt(image: CapturedImage, offset: number): [number, number, number] {
    const a = image.data[offset];
    const b = image.data[offset + 1];
    const c = image.data[offset + 2];
    return image.channelOrder === 'rgb' ? [a, b, c] : [c, b, a];
}

/** Luminância 8 bits (0.299R + 0.587G + 0.114B), um byte por pixel */
export function toGrayscale(image: CapturedImage): Uint8Array {
    const gray = new Uint8Array(image.width * image.height);
    for (let p = 0, i = 0; p < gray.length; p++, i += CHANNELS) {
        const [r, g, b] = rgbAt(image, i);
        gray[p] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
    }
    return gray;
}

/**
 * HSV em escala de 8 bits: H em 0..180 (graus / 2), S e V em 0..255.
 * Retorna três planos do tamanho da imagem.
 */
export function toHsv(image: CapturedImage): { h: Uint8Array; s: Uint8Array; v: Uint8Array } {
    const size = image.width * image.height;
    const h = new Uint8Array(size);
    const s = new Uint8Array(size);
    const v = new Uint8Array(size);

    for (let p = 0, i = 0; p < size; p++, i += CHANNELS) {
        const [r, g, b] = rgbAt(image, i);
        const max = Math.max(r, g, b);
        const min = Math.min(r, g, b);
        const delta = max - min;

        let hue = 0;
        if (delta > 0) {
            if (max === r) hue = (60 * (g - b)) / delta;
            else if (max === g) hue = 120 + (60 * (b - r)) / delta;
            else hue = 240 + (60 * (r - g)) / delta;
            if (hue < 0) hue += 360;
        }

        h[p] = Math.round(hue / 2);
        s[p] = max === 0 ? 0 : Math.round((255 * delta) / max);
        v[p] = max;
    }

    return { h, s, v };
}

/** Binariza: 1 onde gray > threshold, 0 no resto */
export function binarize(gray: Uint8Array, threshold: number): Uint8Array {
    const out = new Uint8Array(gray.length);
    for (let i = 0; i < gray.length; i++) {
        out[i] = gray[i] > threshold ? 1 : 0;
    }
    return out;
}
