import { ProtocolError } from 'puppeteer-core';
import { PuppeteerViewport, toPuppeteerSelector } from '../services/PuppeteerService';
import { encodePng } from '../utils/card-image';
import { UnexpectedModalError, ViewportLostError } from '../utils/errors';
import { solidImage } from './helpers/images';

function fakePage() {
    const browser = { on: jest.fn() };
    const page = {
        on: jest.fn(),
        $: jest.fn(),
        isClosed: jest.fn().mockReturnValue(false),
        browser: jest.fn().mockReturnValue(browser),
    };

    // Dispara o handler registrado em page.on / browser.on
    const emit = (target: 'page' | 'browser', event: string, payload?: unknown): void => {
        const calls: unknown[][] = target === 'page' ? page.on.mock.calls : browser.on.mock.calls;
        for (const [name, handler] of calls) {
            if (name === event && typeof handler === 'function') handler(payload);
        }
    };

    return { page, browser, emit };
}

function fakeDialog(text: string) {
    return { message: () => text, accept: jest.fn().mockResolvedValue(undefined) };
}

function fakeElement() {
    return { click: jest.fn().mockResolvedValue(undefined), screenshot: jest.fn() };
}

describe('toPuppeteerSelector', () => {
    it('XPath vira ::-p-xpath', () => {
        expect(toPuppeteerSelector('/html/body/img')).toBe('::-p-xpath(/html/body/img)');
        expect(toPuppeteerSelector(' (//a)[1] ')).toBe('::-p-xpath((//a)[1])');
    });

    it('CSS passa sem alteração', () => {
        expect(toPuppeteerSelector('#cards > img')).toBe('#cards > img');
    });
});

describe('PuppeteerViewport', () => {
    it('localiza elementos pelo seletor convertido', async () => {
        const { page } = fakePage();
        const element = fakeElement();
        page.$.mockResolvedValue(element);
        const viewport = new PuppeteerViewport(page);

        await expect(viewport.locateElement('//img[1]')).resolves.toBe(element);
        expect(page.$).toHaveBeenCalledWith('::-p-xpath(//img[1])');
    });

    it('aceita o alert ao abrir e guarda o texto', async () => {
        const { page, emit } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const dialog = fakeDialog('驗證碼錯誤');

        emit('page', 'dialog', dialog);

        expect(dialog.accept).toHaveBeenCalledTimes(1);
        await expect(viewport.currentAlertText()).resolves.toBe('驗證碼錯誤');
    });

    it('clique com alert pendente rejeita com UnexpectedModalError', async () => {
        const { page, emit } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const element = fakeElement();

        emit('page', 'dialog', fakeDialog('請重新驗證'));

        await expect(viewport.click(element)).rejects.toThrow(UnexpectedModalError);
        expect(element.click).not.toHaveBeenCalled();
    });

    it('dismissAlert libera o próximo clique', async () => {
        const { page, emit } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const element = fakeElement();

        emit('page', 'dialog', fakeDialog('請重新驗證'));
        await viewport.dismissAlert();

        await expect(viewport.currentAlertText()).resolves.toBeNull();
        await viewport.click(element);
        expect(element.click).toHaveBeenCalledTimes(1);
    });

    it('página fechada gera ViewportLostError', async () => {
        const { page, emit } = fakePage();
        const viewport = new PuppeteerViewport(page);

        emit('page', 'close');

        await expect(viewport.locateElement('#q')).rejects.toThrow(ViewportLostError);
        await expect(viewport.currentAlertText()).rejects.toThrow(ViewportLostError);
    });

    it('navegador desconectado gera ViewportLostError', async () => {
        const { page, emit } = fakePage();
        const viewport = new PuppeteerViewport(page);

        emit('browser', 'disconnected');

        await expect(viewport.click(fakeElement())).rejects.toThrow(ViewportLostError);
    });

    it('sessão encerrada durante o clique vira ViewportLostError', async () => {
        const { page } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const element = fakeElement();
        element.click.mockRejectedValue(new ProtocolError('Protocol error (Input.dispatchMouseEvent): Target closed'));

        await expect(viewport.click(element)).rejects.toThrow(ViewportLostError);
    });

    it('outros erros do puppeteer passam adiante', async () => {
        const { page } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const element = fakeElement();
        const failure = new Error('Node is detached from document');
        element.click.mockRejectedValue(failure);

        await expect(viewport.click(element)).rejects.toBe(failure);
    });

    it('captura a região decodificando o PNG', async () => {
        const { page } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const element = fakeElement();
        element.screenshot.mockResolvedValue(await encodePng(solidImage(3, 2, [10, 20, 30])));

        const image = await viewport.captureRegion(element);

        expect(element.screenshot).toHaveBeenCalledWith({ type: 'png' });
        expect([image.width, image.height, image.channelOrder]).toEqual([3, 2, 'rgb']);
        expect([...image.data.subarray(0, 3)]).toEqual([10, 20, 30]);
    });

    it('waitForCondition respeita o prazo', async () => {
        const { page } = fakePage();
        const viewport = new PuppeteerViewport(page);
        const predicate = jest.fn().mockResolvedValue(false);

        await expect(viewport.waitForCondition(predicate, 0)).resolves.toBe(false);
        expect(predicate).toHaveBeenCalledTimes(1);
        await expect(viewport.waitForCondition(async () => true, 0)).resolves.toBe(true);
    });
});
