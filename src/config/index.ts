import dotenv from 'dotenv';
import path from 'path';

// Carrega variáveis de ambiente
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export interface CaptchaSelectors {
    /** Texto/elemento que indica a página de verificação */
    challengeMarker: string;
    question: string;
    candidates: string[];
    confirm: string;
}

interface Config {
    env: string;
    port: number;
    database: {
        url: string;
        host: string;
        port: number;
        user: string;
        password: string;
        name: string;
    };
    portal: {
        baseUrl: string;
        bulletinUrl: string;
        validateUrl: string;
        orgSearchUrl: string;
        detailUrl: string;
        defaultQuery: string;
        defaultTimeRange: string;
        pageSize: number;
        cronSchedule: string;
        requestDelayMs: number;
    };
    browser: {
        headless: boolean;
        executablePath: string;
    };
    captcha: {
        maxAttempts: number;
        elementTimeoutMs: number;
        alertTimeoutMs: number;
        retryDelayMs: number;
        keepDebugImages: boolean;
        debugDir: string;
        errorLogPath: string;
        selectors: CaptchaSelectors;
    };
    classifier: {
        endpoint: string;
        timeoutMs: number;
        minConfidence: number;
    };
    log: {
        // vazio: debug em development, warn no resto
        level: string;
        dir: string;
    };
}

const CAPTCHA_FORM_XPATH = '/html/body/div/div[2]/div/div/div[3]/div/div[4]/form/table[1]/tbody';

const candidateXPath = (slot: number): string =>
    `${CAPTCHA_FORM_XPATH}/tr[2]/td/table/tbody/tr/td[2]/table/tbody/tr/td[${slot}]/label/img`;

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

const config: Config = {
    env: process.env.NODE_ENV || 'development',
    port: intFromEnv('PORT', 3000),
    database: {
        url: process.env.DATABASE_URL || '',
        host: process.env.DATABASE_HOST || 'localhost',
        port: intFromEnv('DATABASE_PORT', 5432),
        user: process.env.DATABASE_USER || 'postgres',
        password: process.env.DATABASE_PASSWORD || 'postgres',
        name: process.env.DATABASE_NAME || 'tenders',
    },
    portal: {
        baseUrl: process.env.PORTAL_BASE_URL || 'https://web.pcc.gov.tw',
        bulletinUrl: process.env.PORTAL_BULLETIN_URL || 'https://web.pcc.gov.tw/prkms/tender/common/bulletion/readBulletion',
        validateUrl: process.env.PORTAL_VALIDATE_URL || 'https://web.pcc.gov.tw/tps/validate/init',
        orgSearchUrl: process.env.PORTAL_ORG_SEARCH_URL || 'https://web.pcc.gov.tw/prkms/tender/common/orgName/search',
        detailUrl: process.env.PORTAL_DETAIL_URL || 'https://web.pcc.gov.tw/tps/QueryTender/query/searchTenderDetail',
        defaultQuery: process.env.DEFAULT_QUERY || '案',
        defaultTimeRange: process.env.DEFAULT_TIME_RANGE || '113',
        // O portal não aceita mais de 100 linhas por página
        pageSize: Math.min(intFromEnv('DEFAULT_PAGE_SIZE', 100), 100),
        cronSchedule: process.env.SCRAPER_CRON_SCHEDULE || '0 6 * * *',
        requestDelayMs: intFromEnv('PORTAL_REQUEST_DELAY_MS', 500),
    },
    browser: {
        headless: process.env.BROWSER_HEADLESS ? process.env.BROWSER_HEADLESS === 'true' : true,
        executablePath: process.env.CHROME_PATH || '/usr/bin/google-chrome',
    },
    captcha: {
        maxAttempts: intFromEnv('CAPTCHA_MAX_ATTEMPTS', 10),
        elementTimeoutMs: intFromEnv('CAPTCHA_ELEMENT_TIMEOUT_MS', 10000),
        alertTimeoutMs: intFromEnv('CAPTCHA_ALERT_TIMEOUT_MS', 3000),
        retryDelayMs: intFromEnv('CAPTCHA_RETRY_DELAY_MS', 1000),
        keepDebugImages: process.env.CAPTCHA_KEEP_DEBUG === 'true',
        debugDir: process.env.CAPTCHA_DEBUG_DIR || path.join(process.cwd(), 'logs', 'captcha-debug'),
        errorLogPath: process.env.CAPTCHA_ERROR_LOG || path.join(process.cwd(), 'logs', 'captcha-errors.log'),
        selectors: {
            challengeMarker: "//div[contains(text(), '驗證碼檢核')]",
            question: `${CAPTCHA_FORM_XPATH}/tr[1]/td/table/tbody/tr/td[2]/img`,
            candidates: [1, 2, 3, 4, 5, 6].map(candidateXPath),
            confirm: "//input[@value='確認送出']",
        },
    },
    classifier: {
        endpoint: process.env.CARD_CLASSIFIER_URL || '',
        timeoutMs: intFromEnv('CARD_CLASSIFIER_TIMEOUT_MS', 5000),
        // Abaixo disso o rótulo é tratado como "unknown"
        minConfidence: Number(process.env.CARD_CLASSIFIER_MIN_CONFIDENCE || '0'),
    },
    log: {
        level: process.env.LOG_LEVEL || '',
        dir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
    },
};

export default config;
