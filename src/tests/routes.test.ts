import request from 'supertest';
import { Server } from '../server';
import database from '../database';
import tenderWorker from '../workers/TenderWorker';
import tendersService from '../services/TendersService';

jest.mock('../database', () => ({
    __esModule: true,
    default: { testConnection: jest.fn(), close: jest.fn(), query: jest.fn() },
}));

jest.mock('../workers/TenderWorker', () => ({
    __esModule: true,
    default: { trigger: jest.fn(), isBusy: jest.fn(), start: jest.fn() },
}));

jest.mock('../services/TendersService', () => ({
    __esModule: true,
    default: { list: jest.fn() },
}));

const trigger = jest.mocked(tenderWorker.trigger);
const isBusy = jest.mocked(tenderWorker.isBusy);
const list = jest.mocked(tendersService.list);
const testConnection = jest.mocked(database.testConnection);

describe('API', () => {
    const app = new Server().app;

    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('GET /health informa o estado do banco', async () => {
        testConnection.mockResolvedValue(true);

        const response = await request(app).get('/health');

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: 'ok', database: true });
    });

    describe('POST /api/scraper/run', () => {
        it('dispara a coleta com as opções validadas', async () => {
            trigger.mockReturnValue(true);

            const response = await request(app)
                .post('/api/scraper/run')
                .send({ query: '道路', pageSize: 20, phase: 'discovery' });

            expect(response.status).toBe(202);
            expect(response.body).toEqual({ success: true, message: 'Coleta iniciada' });
            expect(trigger).toHaveBeenCalledWith({ query: '道路', pageSize: 20, phase: 'discovery' });
        });

        it('corpo vazio usa os padrões', async () => {
            trigger.mockReturnValue(true);

            const response = await request(app).post('/api/scraper/run');

            expect(response.status).toBe(202);
            expect(trigger).toHaveBeenCalledWith({});
        });

        it('409 quando já há coleta em andamento', async () => {
            trigger.mockReturnValue(false);

            const response = await request(app).post('/api/scraper/run').send({});

            expect(response.status).toBe(409);
            expect(response.body).toEqual({ success: false, error: 'Já existe uma coleta em andamento' });
        });

        it.each([{ pageSize: 500 }, { phase: 'all' }, { timeRange: '2024' }, { headless: false }])(
            '400 para corpo inválido %j',
            async (body) => {
                const response = await request(app).post('/api/scraper/run').send(body);

                expect(response.status).toBe(400);
                expect(response.body.success).toBe(false);
                expect(trigger).not.toHaveBeenCalled();
            },
        );
    });

    it('GET /api/scraper/status', async () => {
        isBusy.mockReturnValue(true);

        const response = await request(app).get('/api/scraper/status');

        expect(response.body).toEqual({ success: true, running: true });
    });

    describe('GET /api/tenders', () => {
        it('lista com filtro de status e limite', async () => {
            list.mockResolvedValue([
                {
                    tender_no: 'A-001',
                    organization_id: '3.80.1',
                    org_name: 'Test Agency',
                    project_name: 'Road repair',
                    url: 'https://portal.test/t?pk=1',
                    publication_date: '2024-10-30',
                    deadline: null,
                    scrap_status: 'found',
                    tender_method: null,
                    budget_amount: null,
                },
            ]);

            const response = await request(app).get('/api/tenders?status=found&limit=5');

            expect(response.status).toBe(200);
            expect(response.body.total).toBe(1);
            expect(response.body.data[0].tender_no).toBe('A-001');
            expect(list).toHaveBeenCalledWith({ status: 'found', limit: 5 });
        });

        it('400 para parâmetros inválidos', async () => {
            const response = await request(app).get('/api/tenders?status=archived');

            expect(response.status).toBe(400);
            expect(response.body).toEqual({ success: false, error: 'Parâmetros inválidos (status, limit)' });
            expect(list).not.toHaveBeenCalled();
        });

        it('500 quando o banco falha', async () => {
            list.mockRejectedValue(new Error('connection refused'));

            const response = await request(app).get('/api/tenders');

            expect(response.status).toBe(500);
            expect(response.body).toEqual({ success: false, error: 'Erro ao listar editais' });
        });
    });

    it('404 para rota desconhecida', async () => {
        const response = await request(app).get('/api/unknown');

        expect(response.status).toBe(404);
        expect(response.body).toEqual({ success: false, error: 'Rota não encontrada: GET /api/unknown' });
    });

    it('JSON mal formado responde 400', async () => {
        const response = await request(app)
            .post('/api/scraper/run')
            .set('Content-Type', 'application/json')
            .send('{"query":');

        expect(response.status).toBe(400);
        expect(response.body.success).toBe(false);
    });
});
