import { Request, Response } from 'express';
import { z } from 'zod';
import logger from '../utils/logger';
import tenderWorker from '../workers/TenderWorker';

const runRequestSchema = z
    .object({
        query: z.string().trim().min(1).optional(),
        // Ano no calendário ROC, ex.: "113"
        timeRange: z.string().regex(/^\d{2,3}$/).optional(),
        pageSize: z.number().int().min(1).max(100).optional(),
        phase: z.enum(['discovery', 'detail', 'both']).optional(),
        keepDebugImages: z.boolean().optional(),
    })
    .strict();

class ScraperController {
    /**
     * POST /api/scraper/run
     * Dispara a coleta em segundo plano
     */
    async run(req: Request, res: Response): Promise<void> {
        const parsed = runRequestSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({
                success: false,
                error: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
            });
            return;
        }

        if (!tenderWorker.trigger(parsed.data)) {
            res.status(409).json({ success: false, error: 'Já existe uma coleta em andamento' });
            return;
        }

        logger.info('[ScraperController] Coleta disparada via API');
        res.status(202).json({ success: true, message: 'Coleta iniciada' });
    }

    /**
     * GET /api/scraper/status
     */
    status(_req: Request, res: Response): void {
        res.json({ success: true, running: tenderWorker.isBusy() });
    }
}

export default new ScraperController();
