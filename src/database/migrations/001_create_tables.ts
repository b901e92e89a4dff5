import database from '../index';
import logger from '../../utils/logger';

export async function createOrganizationsTable(): Promise<void> {
    const query = `
    CREATE TABLE IF NOT EXISTS organizations (
      site_id TEXT PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );
  `;

    try {
        await database.query(query);
        logger.info('Tabela organizations criada');
    } catch (error) {
        logger.error('Erro ao criar tabela organizations');
        throw error;
    }
}

export async function createTendersTable(): Promise<void> {
    const query = `
    CREATE TABLE IF NOT EXISTS tenders (
      organization_id TEXT NOT NULL REFERENCES organizations(site_id),
      tender_no TEXT NOT NULL,
      publication_date DATE NOT NULL,
      url TEXT UNIQUE,
      pk_pms_main TEXT,
      project_name TEXT,
      deadline DATE,
      scrap_status TEXT CHECK (scrap_status IN ('found', 'finished', 'failed')),
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      PRIMARY KEY (tender_no, organization_id, publication_date)
    );

    CREATE INDEX IF NOT EXISTS idx_tenders_scrap_status ON tenders(scrap_status);
    CREATE INDEX IF NOT EXISTS idx_tenders_publication_date ON tenders(publication_date DESC);
  `;

    try {
        await database.query(query);
        logger.info('Tabela tenders criada');
    } catch (error) {
        logger.error('Erro ao criar tabela tenders');
        throw error;
    }
}
