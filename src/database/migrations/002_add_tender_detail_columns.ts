import database from '../index';
import logger from '../../utils/logger';
import { tenderDetailColumns } from '../../utils/tenderFieldMap';

/** Uma coluna TEXT por campo da página de detalhe (data/tender-field-map.json) */
export async function addTenderDetailColumns(): Promise<void> {
    const columns = tenderDetailColumns();
    const query = `
    ALTER TABLE tenders
      ${columns.map((column) => `ADD COLUMN IF NOT EXISTS ${column} TEXT`).join(',\n      ')};
  `;

    try {
        await database.query(query);
        logger.info(`Colunas de detalhe em tenders (${columns.length})`);
    } catch (error) {
        logger.error('Erro ao adicionar colunas de detalhe em tenders');
        throw error;
    }
}
