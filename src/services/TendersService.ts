/**
 * Persistência de editais e órgãos (PostgreSQL)
 *
 * Chave do edital: (tender_no, organization_id, publication_date).
 * A descoberta grava com scrap_status 'found'; a fase de detalhe completa
 * as colunas e marca 'finished' ou 'failed'.
 */

import Database from '../database';
import logger from '../utils/logger';
import { isColumnName } from '../utils/tenderFieldMap';
import type { PendingTender, ScrapeStatus, StoredTender, TenderRecord } from '../types/tender';

const PRIMARY_KEY = ['tender_no', 'organization_id', 'publication_date'] as const;

const SCRAPE_STATUSES: readonly ScrapeStatus[] = ['found', 'finished', 'failed'];

export function isScrapeStatus(value: unknown): value is ScrapeStatus {
    return typeof value === 'string' && SCRAPE_STATUSES.some((status) => status === value);
}

export interface ListTendersFilter {
    status?: ScrapeStatus;
    limit?: number;
}

class TendersService {
    async saveOrganization(siteId: string, name: string): Promise<void> {
        await Database.query(
            'INSERT INTO organizations (site_id, name) VALUES ($1, $2) ON CONFLICT (site_id) DO NOTHING',
            [siteId, name],
        );
        logger.debug(`[TendersService] Órgão salvo: ${siteId} (${name})`);
    }

    async getOrganizationId(name: string): Promise<string | null> {
        const rows = await Database.query<{ site_id: string }>(
            'SELECT site_id FROM organizations WHERE name = $1',
            [name],
        );
        return rows.length > 0 ? rows[0].site_id : null;
    }

    async getTenderStatus(url: string): Promise<ScrapeStatus | null> {
        const rows = await Database.query<{ scrap_status: string | null }>(
            'SELECT scrap_status FROM tenders WHERE url = $1',
            [url],
        );
        if (rows.length === 0) return null;

        const status = rows[0].scrap_status;
        return isScrapeStatus(status) ? status : null;
    }

    /**
     * Insere ou atualiza o edital pela chave composta.
     * Colunas com valor undefined ficam de fora (não apagam o que já existe).
     */
    async saveTender(record: TenderRecord): Promise<boolean> {
        const missing = PRIMARY_KEY.filter((column) => !record[column]);
        if (missing.length > 0) {
            logger.warn(`[TendersService] Edital sem chave (${missing.join(', ')}), ignorado`);
            return false;
        }

        const entries = Object.entries(record).filter(
            (entry): entry is [string, string | null] => entry[1] !== undefined,
        );

        const invalid = entries.find(([column]) => !isColumnName(column));
        if (invalid) {
            throw new Error(`Coluna inválida para tenders: ${invalid[0]}`);
        }

        const columns = entries.map(([column]) => column);
        const values = entries.map(([, value]) => value);
        const placeholders = columns.map((_, i) => `$${i + 1}`);
        const updates = columns
            .filter((column) => !PRIMARY_KEY.some((key) => key === column))
            .map((column) => `${column} = EXCLUDED.${column}`);

        const query = `
            INSERT INTO tenders (${columns.join(', ')})
            VALUES (${placeholders.join(', ')})
            ON CONFLICT (tender_no, organization_id, publication_date) DO UPDATE SET
                ${[...updates, 'updated_at = CURRENT_TIMESTAMP'].join(',\n                ')}
        `;

        await Database.query(query, values);
        logger.debug(`[TendersService] Edital ${record.tender_no} salvo (${record.scrap_status})`);
        return true;
    }

    /** Editais descobertos que ainda não tiveram a página de detalhe lida */
    async listPending(): Promise<PendingTender[]> {
        return Database.query<PendingTender>(
            `
            SELECT tender_no, organization_id, url, pk_pms_main,
                   to_char(publication_date, 'YYYY-MM-DD') AS publication_date
            FROM tenders
            WHERE scrap_status = 'found'
            ORDER BY publication_date DESC
        `,
        );
    }

    async list(filter: ListTendersFilter = {}): Promise<StoredTender[]> {
        const params: unknown[] = [];
        const where: string[] = [];

        if (filter.status) {
            params.push(filter.status);
            where.push(`scrap_status = $${params.length}`);
        }

        params.push(filter.limit ?? 50);

        return Database.query<StoredTender>(
            `
            SELECT tender_no, organization_id, org_name, project_name, url,
                   to_char(publication_date, 'YYYY-MM-DD') AS publication_date,
                   to_char(deadline, 'YYYY-MM-DD') AS deadline,
                   scrap_status, tender_method, budget_amount
            FROM tenders
            ${where.length > 0 ? `WHERE ${where.join(' AND ')}` : ''}
            ORDER BY publication_date DESC
            LIMIT $${params.length}
        `,
            params,
        );
    }
}

export { TendersService };
export default new TendersService();
