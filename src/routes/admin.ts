import { Router } from 'express';
import * as adminController from '../controllers/adminController';
import { requireAdmin } from '../middleware/auth';

/**
 * Admin Routes
 * /api/admin/*
 */

const router = Router();

router.use(requireAdmin);

// GET /api/admin/status
router.get('/status', adminController.getStatus);

// POST /api/admin/backup
router.post('/backup', adminController.backup);

// POST /api/admin/export
router.post('/export', adminController.exportCsv);

// POST /api/admin/merge
router.post('/merge', adminController.merge);

export default router;
