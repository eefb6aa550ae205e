import { Router } from 'express';
import * as patientController from '../controllers/patientController';

/**
 * Patient Routes
 * /api/patients/*
 */

const router = Router();

// GET /api/patients?name=santos&sortBy=recentVisit&page=1
router.get('/', patientController.searchPatients);

// POST /api/patients
router.post('/', patientController.createPatient);

// GET /api/patients/:id
router.get('/:id', patientController.getPatient);

// PUT /api/patients/:id
router.put('/:id', patientController.updatePatient);

// DELETE /api/patients/:id
router.delete('/:id', patientController.deletePatient);

// GET /api/patients/:id/visits
router.get('/:id/visits', patientController.getPatientVisits);

// GET /api/patients/:id/summary
router.get('/:id/summary', patientController.getPatientSummary);

// POST /api/patients/:id/merge
router.post('/:id/merge', patientController.mergePatient);

export default router;
