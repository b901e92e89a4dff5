import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import config from './config';
import logger from './utils/logger';
import database from './database';
import systemController from './controllers/SystemController';
import tenderWorker from './workers/TenderWorker';

// Importar rotas
import apiRoutes from './routes';

export class Server {
    public app: Application;
    private port: number;

    constructor() {
        this.app = express();
        this.port = config.port;

        this.initializeMiddlewares();
        this.initializeRoutes();
        this.initializeErrorHandling();
    }

    private initializeMiddlewares(): void {
        this.app.use(helmet());
        this.app.use(cors());
        this.app.use(express.json());

        // Request logging
        this.app.use((req: Request, _res: Response, next: NextFunction) => {
            logger.http(`${req.method} ${req.path}`);
            next();
        });
    }

    private initializeRoutes(): void {
        this.app.get('/health', systemController.health.bind(systemController));
        this.app.use('/api', apiRoutes);

        this.app.use((req: Request, res: Response) => {
            res.status(404).json({ success: false, error: `Rota não encontrada: ${req.method} ${req.path}` });
        });
    }

    private initializeErrorHandling(): void {
        this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
            logger.error(`Erro não tratado: ${err.message}`);
            // JSON mal formado no corpo chega aqui com status 400
            const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
            res.status(status).json({
                success: false,
                error: status < 500 || config.env !== 'production' ? err.message : 'Erro interno do servidor',
            });
        });
    }

    public async start(): Promise<void> {
        const dbConnected = await database.testConnection();
        if (!dbConnected) {
            logger.warn('Banco de dados não conectado - servidor rodando em modo limitado');
            if (config.env === 'production') {
                throw new Error('Falha ao conectar com o banco de dados');
            }
        }

        const httpServer = this.app.listen(this.port, () => {
            logger.info(`Servidor rodando na porta ${this.port}`);
        });

        httpServer.on('error', (error: NodeJS.ErrnoException) => {
            logger.error(`Erro no servidor HTTP: ${error.message}`);
            process.exit(1);
        });

        tenderWorker.start();

        // Graceful shutdown
        const shutdown = (): void => {
            logger.info('Encerrando servidor...');
            httpServer.close();
            database
                .close()
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    logger.error(`Erro ao encerrar servidor: ${error instanceof Error ? error.message : String(error)}`);
                    process.exit(1);
                });
        };
        process.on('SIGTERM', shutdown);
        process.on('SIGINT', shutdown);
    }
}

if (require.main === module) {
    new Server().start().catch((error: unknown) => {
        logger.error(`Erro ao iniciar servidor: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
    });
}
