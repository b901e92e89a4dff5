import { Router } from 'express';
import scraperController from '../controllers/ScraperController';
import tendersController from '../controllers/TendersController';

const router = Router();

// Coleta
router.post('/scraper/run', scraperController.run.bind(scraperController));
router.get('/scraper/status', scraperController.status.bind(scraperController));

// Editais
router.get('/tenders', tendersController.list.bind(tendersController));

export default router;
