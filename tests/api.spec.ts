import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import request from 'supertest';
import jwt from 'jsonwebtoken';
import app from '../src/app';
import { config } from '../src/config/config';
import { mariaSantos, setupTestStore } from './setup';

const PASSWORD = 'test-secret';

async function setupAdmin(): Promise<string> {
  const res = await request(app).post('/api/auth/setup').send({ username: 'admin', password: PASSWORD }).expect(201);
  return res.body.data.token;
}

describe('HTTP API', () => {
  const ctx = setupTestStore();

  describe('GET /health', () => {
    it('reports ok without authentication', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.body.status).toBe('ok');
    });
  });

  describe('/api/auth', () => {
    it('reports first run until setup completes', async () => {
      const before = await request(app).get('/api/auth/status').expect(200);
      expect(before.body.data).toEqual({ needsFirstRun: true, schemaVersion: 3 });

      await setupAdmin();

      const after = await request(app).get('/api/auth/status').expect(200);
      expect(after.body.data.needsFirstRun).toBe(false);
    });

    it('issues a token carrying the account identity', async () => {
      const token = await setupAdmin();

      const payload = jwt.verify(token, config.auth.jwtSecret);

      expect(payload).toMatchObject({ accountId: 1, username: 'admin', role: 'admin' });
    });

    it('refuses a second setup', async () => {
      await setupAdmin();

      const res = await request(app)
        .post('/api/auth/setup')
        .send({ username: 'intruder', password: PASSWORD })
        .expect(409);

      expect(res.body).toEqual({
        status: 'error',
        code: 'CONSTRAINT_VIOLATION',
        message: 'An account already exists',
        constraint: 'setup_complete',
      });
    });

    it('creates a single admin when two setups arrive together', async () => {
      const { store } = ctx();

      const results = await Promise.all([
        request(app).post('/api/auth/setup').send({ username: 'first', password: PASSWORD }),
        request(app).post('/api/auth/setup').send({ username: 'second', password: PASSWORD }),
      ]);

      expect(results.map((res) => res.status).sort()).toEqual([201, 409]);
      expect(store.listAccounts()).toHaveLength(1);
    });

    it('logs in with the right password only', async () => {
      await setupAdmin();

      const ok = await request(app).post('/api/auth/login').send({ username: 'admin', password: PASSWORD }).expect(200);
      const bad = await request(app)
        .post('/api/auth/login')
        .send({ username: 'admin', password: 'wrong-secret' })
        .expect(401);

      expect(ok.body.data.account.username).toBe('admin');
      expect(typeof ok.body.data.token).toBe('string');
      expect(bad.body).toEqual({ status: 'error', code: 'UNAUTHORIZED', message: 'Invalid username or password' });
    });
  });

  describe('authentication', () => {
    it('requires a bearer token', async () => {
      const res = await request(app).get('/api/patients').expect(401);

      expect(res.body.message).toBe('Authentication required');
    });

    it('rejects a token signed with another secret', async () => {
      const forged = jwt.sign({ accountId: 1, username: 'admin', role: 'admin' }, 'another-test-secret');

      const res = await request(app).get('/api/patients').set('Authorization', `Bearer ${forged}`).expect(401);

      expect(res.body.message).toBe('Invalid or expired token');
    });

    it('keeps staff out of admin routes', async () => {
      const adminToken = await setupAdmin();
      await request(app)
        .post('/api/accounts')
        .set('Authorization', `Bearer ${adminToken}`)
        .send({ username: 'front.desk', password: PASSWORD, role: 'staff' })
        .expect(201);
      const login = await request(app)
        .post('/api/auth/login')
        .send({ username: 'front.desk', password: PASSWORD })
        .expect(200);
      const staffToken = login.body.data.token;

      const res = await request(app).get('/api/admin/status').set('Authorization', `Bearer ${staffToken}`).expect(403);
      await request(app).get('/api/patients').set('Authorization', `Bearer ${staffToken}`).expect(200);

      expect(res.body).toEqual({ status: 'error', code: 'FORBIDDEN', message: 'Administrator role required' });
    });
  });

  describe('/api/patients', () => {
    it('creates a patient and finds it by search', async () => {
      const token = await setupAdmin();
      const auth = `Bearer ${token}`;

      const created = await request(app).post('/api/patients').set('Authorization', auth).send(mariaSantos).expect(201);
      const found = await request(app)
        .get('/api/patients')
        .query('ageRange[min]=30&ageRange[max]=40&sex=F')
        .set('Authorization', auth)
        .expect(200);

      expect(created.body.data.reference).toBe('00-00-01');
      expect(found.body.data).toHaveLength(1);
      expect(found.body.data[0].age).toBe(34);
      expect(found.body.pagination).toEqual({ page: 1, pageSize: 25, totalCount: 1 });
      expect(found.body.meta).toEqual({ strategy: 'birthDate', referenceDate: '2024-06-15' });
    });

    it('names the invalid field without echoing the value', async () => {
      const token = await setupAdmin();

      const res = await request(app)
        .post('/api/patients')
        .set('Authorization', `Bearer ${token}`)
        .send({ lastName: 'Santos', firstName: 'Maria', sex: 'X' })
        .expect(400);

      expect(res.body).toEqual({
        status: 'error',
        code: 'VALIDATION_ERROR',
        message: 'Invalid sex: must be one of M, F',
        field: 'sex',
      });
    });

    it('maps missing records and bad ids', async () => {
      const token = await setupAdmin();
      const auth = `Bearer ${token}`;

      const missing = await request(app).get('/api/patients/999').set('Authorization', auth).expect(404);
      const bad = await request(app).get('/api/patients/abc').set('Authorization', auth).expect(400);

      expect(missing.body.message).toBe('Patient 999 not found');
      expect(bad.body.field).toBe('id');
    });

    it('blocks deleting a patient with visits', async () => {
      const token = await setupAdmin();
      const auth = `Bearer ${token}`;
      const { store } = ctx();
      const patient = store.createPatient(mariaSantos);
      await request(app)
        .post('/api/visits')
        .set('Authorization', auth)
        .send({ patientId: patient.id, visitDate: '2024-06-15', weightKg: 60 })
        .expect(201);

      const res = await request(app).delete(`/api/patients/${patient.id}`).set('Authorization', auth).expect(409);

      expect(res.body.constraint).toBe('patient_has_visits');
    });

    it('lists a patient visits with pagination', async () => {
      const token = await setupAdmin();
      const { store } = ctx();
      const patient = store.createPatient(mariaSantos);
      store.createVisit({ patientId: patient.id, visitDate: '2024-01-15' });
      store.createVisit({ patientId: patient.id, visitDate: '2024-02-15' });

      const res = await request(app)
        .get(`/api/patients/${patient.id}/visits?pageSize=1`)
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.data.map((v: { visitDate: string }) => v.visitDate)).toEqual(['2024-02-15']);
      expect(res.body.pagination).toEqual({ page: 1, pageSize: 1, totalCount: 2 });
    });
  });

  describe('/api/visits', () => {
    it('lists the visits of a day', async () => {
      const token = await setupAdmin();
      const { store } = ctx();
      const patient = store.createPatient(mariaSantos);
      store.createVisit({ patientId: patient.id, visitDate: '2024-06-15', visitTime: '09:00' });

      const res = await request(app)
        .get('/api/visits/by-date/2024-06-15')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0].patientName).toBe('Santos, Maria');
    });
  });

  describe('/api/stats', () => {
    it('serves the dashboard aggregates', async () => {
      const token = await setupAdmin();
      const { store } = ctx();
      const patient = store.createPatient(mariaSantos);
      store.createVisit({ patientId: patient.id, visitDate: '2024-06-15' });
      const auth = `Bearer ${token}`;

      const all = await request(app).get('/api/stats').set('Authorization', auth).expect(200);
      const one = await request(app).get('/api/stats/visitsToday').set('Authorization', auth).expect(200);
      const unknown = await request(app).get('/api/stats/revenue').set('Authorization', auth).expect(404);

      expect(all.body.data).toMatchObject({ totalPatients: 1, totalVisits: 1, visitsToday: 1 });
      expect(one.body.data).toEqual({ name: 'visitsToday', value: 1 });
      expect(unknown.body.message).toBe('Stat revenue not found');
    });
  });

  describe('/api/admin', () => {
    it('backs up and exports to files on the store machine', async () => {
      const token = await setupAdmin();
      const { store, dir } = ctx();
      store.createPatient(mariaSantos);
      const auth = `Bearer ${token}`;
      const backupPath = path.join(dir, 'backup.db');
      const csvPath = path.join(dir, 'patients.csv');

      const backup = await request(app)
        .post('/api/admin/backup')
        .set('Authorization', auth)
        .send({ destination: backupPath })
        .expect(201);
      const exported = await request(app)
        .post('/api/admin/export')
        .set('Authorization', auth)
        .send({ destination: csvPath, filter: { sex: 'F' } })
        .expect(201);

      expect(backup.body.data.path).toBe(path.resolve(backupPath));
      expect(fs.existsSync(backupPath)).toBe(true);
      expect(exported.body.data).toEqual({ path: csvPath, rows: 1 });
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/nothing-here').expect(404);

    expect(res.body).toEqual({ status: 'error', code: 'NOT_FOUND', message: 'Route /api/nothing-here not found' });
  });
});
