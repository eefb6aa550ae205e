import { Router } from 'express';
import * as statsController from '../controllers/statsController';

/**
 * Stats Routes
 * /api/stats/*
 */

const router = Router();

// GET /api/stats
router.get('/', statsController.getStats);

// GET /api/stats/:name
router.get('/:name', statsController.getStat);

export default router;
