/**
 * Scraper do portal de compras públicas
 *
 * - Listagem (bulletin): uma linha por edital, paginada
 * - Busca de órgão: nome -> código do órgão no portal
 * - Detalhe: tabela rótulo/valor mapeada para colunas (data/tender-field-map.json)
 *
 * Qualquer página pode cair na verificação de cartas; nesse caso o
 * CaptchaService resolve antes de seguir.
 */

import config from '../config';
import logger from '../utils/logger';
import { ViewportLostError, errorMessage } from '../utils/errors';
import { parseRocDate } from '../utils/rocDate';
import { loadTenderFieldMap } from '../utils/tenderFieldMap';
import puppeteerService, { PuppeteerService } from './PuppeteerService';
import captchaService, { CaptchaService } from './CaptchaService';
import type { TenderDetails, TenderListing } from '../types/tender';

const LISTING_ROW_SELECTOR = '#bulletion > tbody > tr';
const ORG_SEARCH_INPUT_XPATH = '/html/body/div/div[2]/div/div[2]/div/form/table/tbody/tr/td[1]/input';
const ORG_SEARCH_FORM_XPATH = '/html/body/div/div[2]/div/div[2]/div/form';
const ORG_RESULT_CELL_XPATH = '/html/body/div/div[2]/div/div[2]/div/table/tbody/tr[2]/td[1]';

// "招標" (em licitação), já codificado como o portal espera
const TENDER_STATUS_OPEN = '%E6%8B%9B%E6%A8%99';
const PAGINATION_PARAM = 'd-3611040-p';
const ORG_LOOKUP_MAX_RETRIES = 5;

export interface ListingQuery {
    query: string;
    timeRange: string;
    pageSize: number;
}

export interface ListingPage {
    listings: TenderListing[];
    rowCount: number;
    hasMore: boolean;
}

export interface RowCells {
    cells: string[];
    link: string | null;
}

export function buildListingUrl(baseUrl: string, query: ListingQuery, page = 1): string {
    const url =
        `${baseUrl}?querySentence=${encodeURIComponent(query.query)}` +
        `&tenderStatusType=${TENDER_STATUS_OPEN}&sortCol=TENDER_NOTICE_DATE` +
        `&timeRange=${encodeURIComponent(query.timeRange)}&pageSize=${query.pageSize}`;

    return page > 1 ? `${url}&${PAGINATION_PARAM}=${page}` : url;
}

export function buildDetailUrl(baseUrl: string, pkPmsMain: string): string {
    return `${baseUrl}?pkPmsMain=${encodeURIComponent(pkPmsMain)}`;
}

/**
 * Linha da listagem -> edital.
 * Colunas usadas: 2 órgão, 3 número + nome (em linhas), 4 publicação, 6 prazo.
 * Linhas com menos de 10 células ou sem link são ignoradas (null).
 */
export function parseTenderRow({ cells, link }: RowCells): TenderListing | null {
    if (cells.length < 10 || !link) return null;

    const [tenderNo = '', projectName = ''] = cells[3]
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    const publicationDate = cells[4].trim();
    const deadline = cells[6].trim();

    return {
        orgName: cells[2].trim(),
        tenderNo,
        projectName,
        detailUrl: link,
        pkPmsMain: link.split('pk=').pop() ?? '',
        publicationDate,
        deadline,
        publicationDateGregorian: parseRocDate(publicationDate),
        deadlineGregorian: parseRocDate(deadline),
    };
}

/**
 * Células da página de detalhe (em ordem) -> colunas.
 * O valor é a célula seguinte ao rótulo; rótulo na última célula vale "".
 */
export function mapDetailFields(
    cellTexts: readonly string[],
    fieldMap: Readonly<Record<string, string>> = loadTenderFieldMap(),
): TenderDetails {
    const details: TenderDetails = {};

    cellTexts.forEach((text, i) => {
        const column = fieldMap[text.trim()];
        if (column === undefined) return;
        details[column] = (cellTexts[i + 1] ?? '').trim();
    });

    return details;
}

type BrowserPort = Pick<PuppeteerService, 'goto' | 'getPage' | 'getViewport' | 'currentUrl'>;
type ChallengePort = Pick<CaptchaService, 'isChallengePresent' | 'handleChallenge'>;

export class TenderScraperService {
    private keepDebugImages = false;

    constructor(
        private readonly browser: BrowserPort = puppeteerService,
        private readonly captcha: ChallengePort = captchaService,
    ) {}

    setKeepDebugImages(keep: boolean): void {
        this.keepDebugImages = keep;
    }

    /**
     * Navega e resolve a verificação de cartas se ela aparecer.
     * O envio do desafio pode deixar o navegador em outra página; nesse caso
     * a URL pedida é carregada de novo.
     */
    async open(url: string): Promise<void> {
        await this.browser.goto(url);

        const viewport = this.browser.getViewport();
        if (!(await this.captcha.isChallengePresent(viewport))) return;

        const solved = await this.captcha.handleChallenge(viewport, {
            keepDebugImages: this.keepDebugImages,
        });
        if (!solved) {
            throw new Error(`Verificação não resolvida em ${url}`);
        }

        const landedOn = this.browser.currentUrl();
        if (url !== config.portal.validateUrl && landedOn !== url) {
            logger.info(`[Scraper] Após a verificação o navegador ficou em ${landedOn}, voltando para ${url}`);
            await this.browser.goto(url);
        }
    }

    async discoverPage(query: ListingQuery, page: number): Promise<ListingPage> {
        await this.open(buildListingUrl(config.portal.bulletinUrl, query, page));

        const rows = await this.readListingRows();
        const listings: TenderListing[] = [];

        for (const row of rows) {
            const listing = parseTenderRow(row);
            if (listing) listings.push(listing);
        }

        logger.info(`[Scraper] Página ${page}: ${rows.length} linhas, ${listings.length} editais`);

        return {
            listings,
            rowCount: rows.length,
            hasMore: rows.length >= query.pageSize,
        };
    }

    /** Busca o código do órgão no portal (até 5 tentativas) */
    async fetchOrganizationId(orgName: string): Promise<string | null> {
        for (let attempt = 1; attempt <= ORG_LOOKUP_MAX_RETRIES; attempt++) {
            try {
                await this.open(config.portal.orgSearchUrl);
                const page = this.browser.getPage();

                const input = await page.waitForSelector(`::-p-xpath(${ORG_SEARCH_INPUT_XPATH})`, {
                    timeout: config.captcha.elementTimeoutMs,
                });
                if (!input) throw new Error('Campo de busca de órgão não encontrado');

                await input.click({ count: 3 });
                await input.type(orgName);

                const form = await page.$(`::-p-xpath(${ORG_SEARCH_FORM_XPATH})`);
                if (!form) throw new Error('Formulário de busca de órgão não encontrado');

                await Promise.all([
                    page.waitForNavigation({ waitUntil: 'domcontentloaded' }),
                    form.evaluate((element) => {
                        if (element instanceof HTMLFormElement) element.submit();
                    }),
                ]);

                const cell = await page.waitForSelector(`::-p-xpath(${ORG_RESULT_CELL_XPATH})`, {
                    timeout: config.captcha.elementTimeoutMs,
                });
                const siteId = cell ? (await cell.evaluate((element) => element.textContent ?? '')).trim() : '';

                if (siteId) {
                    logger.info(`[Scraper] Órgão "${orgName}" = ${siteId} (tentativa ${attempt})`);
                    return siteId;
                }
            } catch (error) {
                if (error instanceof ViewportLostError) throw error;
                logger.warn(
                    `[Scraper] Falha ao buscar órgão "${orgName}" (${attempt}/${ORG_LOOKUP_MAX_RETRIES}): ${errorMessage(error)}`,
                );
            }

            if (attempt < ORG_LOOKUP_MAX_RETRIES) {
                await this.delay(2000);
            }
        }

        logger.error(`[Scraper] Código do órgão "${orgName}" não encontrado`);
        return null;
    }

    async fetchTenderDetails(pkPmsMain: string): Promise<TenderDetails> {
        await this.open(buildDetailUrl(config.portal.detailUrl, pkPmsMain));

        const cellTexts = await this.browser
            .getPage()
            .$$eval('table td', (cells) => cells.map((cell) => cell.textContent ?? ''));

        return mapDetailFields(cellTexts);
    }

    private async readListingRows(): Promise<RowCells[]> {
        return this.browser.getPage().$$eval(LISTING_ROW_SELECTOR, (rows) =>
            rows.map((row) => {
                const anchor = row.querySelector('td:nth-child(4) a[href]');
                return {
                    cells: Array.from(row.querySelectorAll('td')).map((cell) => cell.innerText),
                    link: anchor instanceof HTMLAnchorElement ? anchor.href : null,
                };
            }),
        );
    }

    private delay(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

export default new TenderScraperService();
