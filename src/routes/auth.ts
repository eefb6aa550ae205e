import { Router } from 'express';
import * as authController from '../controllers/authController';

/**
 * Auth Routes
 * /api/auth/*
 */

const router = Router();

// POST /api/auth/login
router.post('/login', authController.login);

// GET /api/auth/status
router.get('/status', authController.getStatus);

// POST /api/auth/setup
router.post('/setup', authController.setup);

export default router;
