import { Request, Response } from 'express';
import database from '../database';

class SystemController {
    /**
     * GET /health
     */
    async health(_req: Request, res: Response): Promise<void> {
        const connected = await database.testConnection();
        res.json({ status: 'ok', database: connected });
    }
}

export default new SystemController();
