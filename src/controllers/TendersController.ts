import { Request, Response } from 'express';
import { z } from 'zod';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import tendersService from '../services/TendersService';

const listQuerySchema = z.object({
    status: z.enum(['found', 'finished', 'failed']).optional(),
    limit: z.coerce.number().int().min(1).max(500).optional(),
});

class TendersController {
    /**
     * GET /api/tenders?status=&limit=
     * Editais gravados, publicação mais recente primeiro
     */
    async list(req: Request, res: Response): Promise<void> {
        const parsed = listQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            res.status(400).json({ success: false, error: 'Parâmetros inválidos (status, limit)' });
            return;
        }

        try {
            const tenders = await tendersService.list(parsed.data);
            res.json({ success: true, data: tenders, total: tenders.length });
        } catch (error) {
            logger.error(`[TendersController] Erro ao listar editais: ${errorMessage(error)}`);
            res.status(500).json({ success: false, error: 'Erro ao listar editais' });
        }
    }
}

export default new TendersController();
