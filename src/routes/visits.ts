import { Router } from 'express';
import * as visitController from '../controllers/visitController';

/**
 * Visit Routes
 * /api/visits/*
 */

const router = Router();

// GET /api/visits?query=santos&page=1
router.get('/', visitController.searchVisits);

// GET /api/visits/by-date/:date
router.get('/by-date/:date', visitController.getVisitsByDate);

// GET /api/visits/last-encoded
router.get('/last-encoded', visitController.getLastEncoded);

// POST /api/visits
router.post('/', visitController.createVisit);

// GET /api/visits/:id
router.get('/:id', visitController.getVisit);

// PUT /api/visits/:id
router.put('/:id', visitController.updateVisit);

// DELETE /api/visits/:id
router.delete('/:id', visitController.deleteVisit);

export default router;
