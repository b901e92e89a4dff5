import { createOrganizationsTable, createTendersTable } from './001_create_tables';
import { addTenderDetailColumns } from './002_add_tender_detail_columns';
import logger from '../../utils/logger';
import database from '../index';

export async function runMigrations(): Promise<void> {
    logger.info('Iniciando migrations...');

    const connected = await database.testConnection();
    if (!connected) {
        throw new Error('Não foi possível conectar ao banco de dados');
    }

    // Executar migrations em ordem
    await createOrganizationsTable();
    await createTendersTable();
    await addTenderDetailColumns();

    logger.info('Todas as migrations executadas com sucesso!');
}

// Executar se chamado diretamente
if (require.main === module) {
    runMigrations()
        .then(() => database.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
            logger.error(`Erro ao executar migrations: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
        });
}

export default runMigrations;
