import type { ScrapePhase } from '../types/tender';
import type { RunRequest } from '../workers/TenderWorker';

const PHASES: readonly ScrapePhase[] = ['discovery', 'detail', 'both'];

function isPhase(value: string): value is ScrapePhase {
    return PHASES.some((phase) => phase === value);
}

/**
 * Argumentos de run-scraper:
 * --query <texto> --time <ano ROC> --size <n> --phase discovery|detail|both --headless --keep-debug
 */
export function parseScraperArgs(argv: readonly string[]): RunRequest {
    const request: RunRequest = {};

    for (let i = 0; i < argv.length; i++) {
        const flag = argv[i];
        const next = (): string => {
            const value = argv[++i];
            if (value === undefined || value.startsWith('--')) {
                throw new Error(`Valor ausente para ${flag}`);
            }
            return value;
        };

        switch (flag) {
            case '--query':
                request.query = next();
                break;
            case '--time':
                request.timeRange = next();
                break;
            case '--size': {
                const size = parseInt(next(), 10);
                if (Number.isNaN(size) || size < 1) {
                    throw new Error('--size deve ser um inteiro positivo');
                }
                // O portal não aceita mais de 100 linhas por página
                request.pageSize = Math.min(size, 100);
                break;
            }
            case '--phase': {
                const phase = next();
                if (!isPhase(phase)) {
                    throw new Error(`--phase inválido: ${phase} (discovery, detail ou both)`);
                }
                request.phase = phase;
                break;
            }
            case '--headless':
                request.headless = true;
                break;
            case '--keep-debug':
                request.keepDebugImages = true;
                break;
            default:
                throw new Error(`Argumento desconhecido: ${flag}`);
        }
    }

    return request;
}
