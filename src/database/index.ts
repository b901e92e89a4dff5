import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import config from '../config';
import logger from '../utils/logger';

class Database {
    private pool: Pool;
    private static instance: Database;

    private constructor() {
        // DATABASE_URL tem prioridade sobre as configurações individuais
        const poolConfig: PoolConfig = config.database.url
            ? {
                connectionString: config.database.url,
                max: 10,
                idleTimeoutMillis: 30000,
                connectionTimeoutMillis: 15000,
                ssl: {
                    rejectUnauthorized: false,
                },
            }
            : {
                host: config.database.host,
                port: config.database.port,
                user: config.database.user,
                password: config.database.password,
                database: config.database.name,
                max: 10,
                idleTimeoutMillis: 30000,
                connectionTimeoutMillis: 15000,
            };

        this.pool = new Pool(poolConfig);

        this.pool.on('error', (err) => {
            logger.error(`Erro inesperado no pool de conexões PostgreSQL: ${err.message}`);
        });

        logger.debug('Pool de conexões PostgreSQL inicializado');
    }

    public static getInstance(): Database {
        if (!Database.instance) {
            Database.instance = new Database();
        }
        return Database.instance;
    }

    public async query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
        const result = await this.queryFull<T>(text, params);
        return result.rows;
    }

    public async queryFull<T extends QueryResultRow = QueryResultRow>(
        text: string,
        params?: unknown[],
    ): Promise<QueryResult<T>> {
        const start = Date.now();
        try {
            const result = await this.pool.query<T>(text, params);
            logger.debug(`Query executada em ${Date.now() - start}ms`);
            return result;
        } catch (error) {
            logger.error(`Erro ao executar query: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
    }

    public async testConnection(): Promise<boolean> {
        try {
            await this.query('SELECT NOW()');
            logger.info('Conexão com PostgreSQL estabelecida com sucesso');
            return true;
        } catch (error) {
            logger.error(`Falha ao conectar com PostgreSQL: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    public async close(): Promise<void> {
        await this.pool.end();
        logger.info('Pool de conexões PostgreSQL fechado');
    }
}

export default Database.getInstance();
