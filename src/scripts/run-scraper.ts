import logger from '../utils/logger';
import database from '../database';
import { errorMessage } from '../utils/errors';
import { parseScraperArgs } from '../utils/cliArgs';
import tenderWorker from '../workers/TenderWorker';

async function runScraper(): Promise<void> {
    const request = parseScraperArgs(process.argv.slice(2));

    const connected = await database.testConnection();
    if (!connected) {
        throw new Error('Não foi possível conectar ao banco de dados');
    }

    const summary = await tenderWorker.runManual(request);
    if (summary) {
        logger.info(
            `Coleta concluída: ${summary.discovered} novos, ${summary.detailSucceeded}/${summary.detailed} detalhes`,
        );
    }
}

runScraper()
    .then(() => database.close())
    .then(() => process.exit(0))
    .catch((error: unknown) => {
        logger.error(`Erro na coleta: ${errorMessage(error)}`);
        process.exit(1);
    });
