import { Router } from 'express';
import * as accountController from '../controllers/accountController';
import { requireAdmin } from '../middleware/auth';

/**
 * Account Routes
 * /api/accounts/*
 */

const router = Router();

router.use(requireAdmin);

// GET /api/accounts
router.get('/', accountController.listAccounts);

// POST /api/accounts
router.post('/', accountController.createAccount);

// GET /api/accounts/:id
router.get('/:id', accountController.getAccount);

// PUT /api/accounts/:id
router.put('/:id', accountController.updateAccount);

// DELETE /api/accounts/:id
router.delete('/:id', accountController.deleteAccount);

export default router;
