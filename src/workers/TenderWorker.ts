import cron from 'node-cron';
import config from '../config';
import logger from '../utils/logger';
import { ViewportLostError, errorMessage } from '../utils/errors';
import { toIsoDate } from '../utils/rocDate';
import tenderScraperService, { TenderScraperService } from '../services/TenderScraperService';
import tendersService, { TendersService } from '../services/TendersService';
import puppeteerService, { PuppeteerService } from '../services/PuppeteerService';
import cardClassifierService, { CardClassifierService } from '../services/CardClassifierService';
import type {
    ScrapeRunOptions,
    ScrapeRunSummary,
    ScrapeStatus,
    TenderDetails,
    TenderListing,
} from '../types/tender';

type ScraperPort = Pick<
    TenderScraperService,
    'discoverPage' | 'fetchOrganizationId' | 'fetchTenderDetails' | 'setKeepDebugImages'
>;
type TenderStore = Pick<
    TendersService,
    'getOrganizationId' | 'saveOrganization' | 'getTenderStatus' | 'saveTender' | 'listPending'
>;
type BrowserPort = Pick<PuppeteerService, 'initialize' | 'close'>;
type ClassifierPort = Pick<CardClassifierService, 'initialize'>;

export interface TenderWorkerDeps {
    scraper: ScraperPort;
    tenders: TenderStore;
    browser: BrowserPort;
    classifier: ClassifierPort;
    requestDelayMs: number;
}

export interface RunRequest extends Partial<ScrapeRunOptions> {
    headless?: boolean;
}

export function defaultRunOptions(): ScrapeRunOptions {
    return {
        query: config.portal.defaultQuery,
        timeRange: config.portal.defaultTimeRange,
        pageSize: config.portal.pageSize,
        phase: 'both',
        keepDebugImages: config.captcha.keepDebugImages,
    };
}

/**
 * Worker de coleta de editais
 *
 * Fase 1 (descoberta): percorre a listagem e grava cada edital com status 'found'
 * Fase 2 (detalhe): abre a página de cada edital 'found' e marca 'finished' ou 'failed'
 */
export class TenderWorker {
    private isRunning = false;
    private readonly deps: TenderWorkerDeps;

    constructor(deps: Partial<TenderWorkerDeps> = {}) {
        this.deps = {
            scraper: deps.scraper ?? tenderScraperService,
            tenders: deps.tenders ?? tendersService,
            browser: deps.browser ?? puppeteerService,
            classifier: deps.classifier ?? cardClassifierService,
            requestDelayMs: deps.requestDelayMs ?? config.portal.requestDelayMs,
        };
    }

    /** Agenda a coleta (padrão: todo dia às 06:00) */
    start(): void {
        const cronExpression = config.portal.cronSchedule;

        cron.schedule(cronExpression, async () => {
            logger.info('[TenderWorker] Cron disparado');
            try {
                await this.run();
            } catch (error) {
                logger.error(`[TenderWorker] Erro crítico na coleta agendada: ${errorMessage(error)}`);
            }
        });

        logger.info(`[TenderWorker] Worker agendado: ${cronExpression}`);
    }

    isBusy(): boolean {
        return this.isRunning;
    }

    /**
     * Dispara a coleta em segundo plano (usado pela API).
     * Retorna false se já existe uma coleta em andamento.
     */
    trigger(request: RunRequest = {}): boolean {
        if (this.isRunning) return false;

        this.run(request).catch((error: unknown) => {
            logger.error(`[TenderWorker] Erro crítico na coleta: ${errorMessage(error)}`);
        });
        return true;
    }

    /** Execução manual (CLI); erros sobem para quem chamou */
    async runManual(request: RunRequest = {}): Promise<ScrapeRunSummary | null> {
        logger.info('[TenderWorker] Execução manual iniciada');
        return this.run(request);
    }

    private async run(request: RunRequest = {}): Promise<ScrapeRunSummary | null> {
        if (this.isRunning) {
            logger.warn('[TenderWorker] Coleta já está em execução. Ignorando...');
            return null;
        }

        this.isRunning = true;
        const options: ScrapeRunOptions = { ...defaultRunOptions(), ...stripUndefined(request) };
        const startedAt = new Date();

        try {
            logger.info(
                `[TenderWorker] Iniciando coleta: query="${options.query}", ano=${options.timeRange}, ` +
                    `página=${options.pageSize}, fase=${options.phase}`,
            );

            await this.deps.classifier.initialize();
            await this.deps.browser.initialize({ headless: request.headless });
            this.deps.scraper.setKeepDebugImages(options.keepDebugImages);

            const discovered = options.phase === 'detail' ? 0 : await this.discoveryPhase(options);
            const detail =
                options.phase === 'discovery' ? { processed: 0, succeeded: 0 } : await this.detailPhase();

            const summary: ScrapeRunSummary = {
                discovered,
                detailed: detail.processed,
                detailSucceeded: detail.succeeded,
                startedAt,
                finishedAt: new Date(),
            };

            const seconds = Math.round((summary.finishedAt.getTime() - startedAt.getTime()) / 1000);
            logger.info('[TenderWorker] ========== COLETA FINALIZADA ==========');
            logger.info(`[TenderWorker] Tempo total: ${seconds}s`);
            logger.info(`[TenderWorker] Novos editais: ${summary.discovered}`);
            logger.info(`[TenderWorker] Detalhes: ${summary.detailSucceeded}/${summary.detailed}`);

            return summary;
        } finally {
            this.isRunning = false;
            await this.deps.browser.close();
        }
    }

    private async discoveryPhase(options: ScrapeRunOptions): Promise<number> {
        logger.info('[TenderWorker] ========== FASE 1: DESCOBERTA ==========');

        let page = 1;
        let discovered = 0;

        for (;;) {
            const { listings, hasMore } = await this.deps.scraper.discoverPage(options, page);

            for (const [i, listing] of listings.entries()) {
                try {
                    logger.debug(`[TenderWorker] Edital ${i + 1}/${listings.length}: ${listing.tenderNo}`);
                    if (await this.saveDiscovered(listing)) discovered++;
                } catch (error) {
                    if (error instanceof ViewportLostError) throw error;
                    logger.warn(`[TenderWorker] Erro ao processar linha ${listing.tenderNo}: ${errorMessage(error)}`);
                }
            }

            if (!hasMore) break;

            page++;
            await this.delay(this.deps.requestDelayMs);
        }

        logger.info(`[TenderWorker] Descoberta concluída: ${discovered} novos editais`);
        return discovered;
    }

    /** Retorna true quando o edital ainda não estava marcado como 'found' */
    private async saveDiscovered(listing: TenderListing): Promise<boolean> {
        const { tenders, scraper } = this.deps;

        if (!listing.publicationDateGregorian) {
            logger.warn(`[TenderWorker] Edital ${listing.tenderNo} sem data de publicação válida, ignorado`);
            return false;
        }

        let siteId = await tenders.getOrganizationId(listing.orgName);
        if (!siteId) {
            siteId = await scraper.fetchOrganizationId(listing.orgName);
            if (!siteId) {
                logger.warn(`[TenderWorker] Órgão sem código: ${listing.orgName}, edital ignorado`);
                return false;
            }
            await tenders.saveOrganization(siteId, listing.orgName);
        }

        const existing = await tenders.getTenderStatus(listing.detailUrl);
        if (existing === 'finished') {
            logger.debug(`[TenderWorker] Edital ${listing.tenderNo} já processado`);
            return false;
        }

        await tenders.saveTender({
            organization_id: siteId,
            tender_no: listing.tenderNo,
            project_name: listing.projectName,
            publication_date: toIsoDate(listing.publicationDateGregorian),
            deadline: listing.deadlineGregorian ? toIsoDate(listing.deadlineGregorian) : null,
            url: listing.detailUrl,
            pk_pms_main: listing.pkPmsMain,
            scrap_status: 'found',
            org_name: listing.orgName,
        });

        return existing !== 'found';
    }

    private async detailPhase(): Promise<{ processed: number; succeeded: number }> {
        logger.info('[TenderWorker] ========== FASE 2: DETALHES ==========');

        const pending = await this.deps.tenders.listPending();
        logger.info(`[TenderWorker] ${pending.length} editais aguardando detalhes`);

        let processed = 0;
        let succeeded = 0;

        for (const [i, tender] of pending.entries()) {
            logger.info(`[TenderWorker] Detalhes [${i + 1}/${pending.length}]: ${tender.tender_no}`);

            let details: TenderDetails = {};
            let status: ScrapeStatus = 'failed';

            try {
                details = await this.deps.scraper.fetchTenderDetails(tender.pk_pms_main);
                // Sem "招標方式" a página não carregou de fato
                status = details.tender_method ? 'finished' : 'failed';
            } catch (error) {
                if (error instanceof ViewportLostError) throw error;
                logger.warn(`[TenderWorker] Erro na página de detalhe ${tender.tender_no}: ${errorMessage(error)}`);
            }

            try {
                await this.deps.tenders.saveTender({
                    ...details,
                    tender_no: tender.tender_no,
                    organization_id: tender.organization_id,
                    publication_date: tender.publication_date,
                    pk_pms_main: tender.pk_pms_main,
                    scrap_status: status,
                });
                processed++;
                if (status === 'finished') succeeded++;
            } catch (error) {
                logger.error(`[TenderWorker] Erro ao salvar detalhes de ${tender.tender_no}: ${errorMessage(error)}`);
            }

            await this.delay(this.deps.requestDelayMs);
        }

        logger.info(`[TenderWorker] Detalhes concluídos: ${succeeded}/${processed} (${pending.length} pendentes)`);
        return { processed, succeeded };
    }

    private delay(ms: number): Promise<void> {
        return new Promise((resolve) => setTimeout(resolve, ms));
    }
}

function stripUndefined(request: RunRequest): Partial<ScrapeRunOptions> {
    const options: Partial<ScrapeRunOptions> = {};
    if (request.query !== undefined) options.query = request.query;
    if (request.timeRange !== undefined) options.timeRange = request.timeRange;
    if (request.pageSize !== undefined) options.pageSize = Math.min(request.pageSize, 100);
    if (request.phase !== undefined) options.phase = request.phase;
    if (request.keepDebugImages !== undefined) options.keepDebugImages = request.keepDebugImages;
    return options;
}

export default new TenderWorker();
