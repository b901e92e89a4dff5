import puppeteer, { Browser, Dialog, ElementHandle, Page, ProtocolError } from 'puppeteer-core';
import config from '../config';
import logger from '../utils/logger';
import { decodeImage } from '../utils/card-image';
import { UnexpectedModalError, ViewportLostError, errorMessage } from '../utils/errors';
import type { CapturedImage, Viewport } from '../types/captcha';

const POLL_INTERVAL_MS = 100;
const SESSION_CLOSED = /Target closed|Session closed|Connection closed/i;

/** Partes da página e dos elementos usadas pelo viewport */
export type ViewportPage = Pick<Page, 'on' | '$' | 'isClosed' | 'browser'>;
export type ViewportElement = Pick<ElementHandle, 'screenshot'> & { click: OmitThisParameter<ElementHandle['click']> };

/** XPath vira o seletor `::-p-xpath(...)`; o resto é CSS */
export function toPuppeteerSelector(selector: string): string {
    const trimmed = selector.trim();
    if (trimmed.startsWith('/') || trimmed.startsWith('(')) {
        return `::-p-xpath(${trimmed})`;
    }
    return trimmed;
}

/**
 * Viewport do solver sobre uma página puppeteer.
 * Alerts JS são aceitos assim que abrem (senão o clique que os disparou nunca
 * termina); o texto fica pendente até dismissAlert(). Um clique com alert
 * pendente rejeita com UnexpectedModalError.
 */
export class PuppeteerViewport implements Viewport<ViewportElement> {
    private pendingAlert: string | null = null;
    private lost = false;

    constructor(private readonly page: ViewportPage) {
        page.on('dialog', (dialog: Dialog) => {
            const text = dialog.message();
            logger.debug(`[Puppeteer] Alert: ${text}`);
            this.pendingAlert = text;
            dialog.accept().catch((error: unknown) => {
                logger.warn(`[Puppeteer] Falha ao aceitar alert: ${errorMessage(error)}`);
            });
        });
        page.on('close', () => {
            this.lost = true;
        });
        page.browser().on('disconnected', () => {
            this.lost = true;
        });
    }

    async locateElement(selector: string): Promise<ViewportElement | null> {
        return this.guard(() => this.page.$(toPuppeteerSelector(selector)));
    }

    async captureRegion(element: ViewportElement): Promise<CapturedImage> {
        const screenshot = await this.guard(() => element.screenshot({ type: 'png' }));
        return decodeImage(Buffer.from(screenshot));
    }

    async click(element: ViewportElement): Promise<void> {
        if (this.pendingAlert !== null) {
            throw new UnexpectedModalError(this.pendingAlert);
        }
        await this.guard(() => element.click());
    }

    async waitForCondition(predicate: () => Promise<boolean>, timeoutMs: number): Promise<boolean> {
        const deadline = Date.now() + timeoutMs;
        for (;;) {
            if (await predicate()) return true;
            if (Date.now() >= deadline) return false;
            await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS));
        }
    }

    async currentAlertText(): Promise<string | null> {
        this.assertAlive();
        return this.pendingAlert;
    }

    async dismissAlert(): Promise<void> {
        this.assertAlive();
        this.pendingAlert = null;
    }

    private assertAlive(): void {
        if (this.lost || this.page.isClosed()) {
            throw new ViewportLostError('Página do navegador fechada ou desconectada');
        }
    }

    /** Converte perda de sessão do puppeteer em ViewportLostError */
    private async guard<T>(action: () => Promise<T>): Promise<T> {
        this.assertAlive();
        try {
            return await action();
        } catch (error) {
            const sessionClosed = error instanceof ProtocolError && SESSION_CLOSED.test(error.message);
            if (sessionClosed || this.lost || this.page.isClosed()) {
                throw new ViewportLostError(`Sessão do navegador perdida: ${errorMessage(error)}`);
            }
            throw error;
        }
    }
}

/**
 * Serviço do navegador
 * Abre o Chrome (puppeteer-core, executável configurado) e entrega a página de trabalho
 */
export class PuppeteerService {
    private browser: Browser | null = null;
    private page: Page | null = null;
    private viewport: PuppeteerViewport | null = null;
    private readonly defaultViewport = {
        width: 1366,
        height: 768,
        deviceScaleFactor: 1,
    };
    private readonly defaultUserAgent =
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

    async initialize(options: { headless?: boolean } = {}): Promise<void> {
        if (this.browser) return;

        const headless = options.headless ?? config.browser.headless;

        try {
            logger.info(`[Puppeteer] Iniciando navegador (${headless ? 'headless' : 'visível'})...`);

            this.browser = await puppeteer.launch({
                executablePath: config.browser.executablePath,
                headless,
                args: [
                    '--no-sandbox',
                    '--disable-setuid-sandbox',
                    '--disable-dev-shm-usage',
                    ...(headless ? ['--disable-gpu'] : []),
                ],
            });

            const pages = await this.browser.pages();
            this.page = pages.length > 0 ? pages[0] : await this.browser.newPage();

            await this.page.setViewport(this.defaultViewport);
            await this.page.setUserAgent(this.defaultUserAgent);

            this.viewport = new PuppeteerViewport(this.page);

            logger.info('[Puppeteer] Navegador iniciado com sucesso');
        } catch (error) {
            logger.error(`[Puppeteer] Erro ao inicializar navegador: ${errorMessage(error)}`);
            throw error;
        }
    }

    getPage(): Page {
        if (!this.page) {
            throw new Error('Navegador não inicializado. Chame initialize() primeiro.');
        }
        return this.page;
    }

    getViewport(): PuppeteerViewport {
        if (!this.viewport) {
            throw new Error('Navegador não inicializado. Chame initialize() primeiro.');
        }
        return this.viewport;
    }

    /** URL em que a página está agora (pode mudar após o envio do desafio) */
    currentUrl(): string {
        return this.getPage().url();
    }

    async goto(url: string): Promise<void> {
        const page = this.getPage();
        logger.debug(`[Puppeteer] Navegando para ${url}`);
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: 30000 });
    }

    async close(): Promise<void> {
        if (this.browser) {
            await this.browser.close();
            this.browser = null;
            this.page = null;
            this.viewport = null;
            logger.info('[Puppeteer] Navegador fechado');
        }
    }
}

export default new PuppeteerService();
