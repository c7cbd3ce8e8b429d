import type { Express } from 'express';
import type { Knex } from 'knex';
import supertest from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createTestDatabase,
  seedProject,
  seedProjectMember,
  seedTeam,
  seedTeamMember,
  seedUser,
} from '@ticketdesk/database/test-utils';
import { issueApiKey } from '@ticketdesk/users';
import { createApp } from './app';

describe('product api', () => {
  let db: Knex;
  let app: Express;
  let supportTeam: number;
  let workerTeam: number;
  let projectId: number;
  let aliceId: number;
  let bobId: number;
  let outsiderId: number;
  let aliceKey: string;
  let bobKey: string;
  let outsiderKey: string;

  beforeEach(async () => {
    db = await createTestDatabase();
    app = createApp({ knex: db, config: { env: 'test', tickets: { reassignAdminCheck: 'assignee' } } });

    supportTeam = await seedTeam(db, 'Support');
    workerTeam = await seedTeam(db, 'Field Workers');
    projectId = await seedProject(db, 'Portal', { workerTeamId: workerTeam, teamIds: [supportTeam] });

    aliceId = await seedUser(db, 'Alice Admin');
    bobId = await seedUser(db, 'Bob Member');
    outsiderId = await seedUser(db, 'Olga Outsider');

    await seedTeamMember(db, supportTeam, aliceId, 'admin', '2026-01-01T09:00:00.000Z');
    await seedTeamMember(db, supportTeam, bobId, 'member', '2026-01-02T09:00:00.000Z');
    await seedProjectMember(db, projectId, aliceId, 'admin');
    await seedProjectMember(db, projectId, bobId, 'member');

    aliceKey = await issueApiKey(db, aliceId, 'alice');
    bobKey = await issueApiKey(db, bobId, 'bob');
    outsiderKey = await issueApiKey(db, outsiderId, 'outsider');
  });

  afterEach(async () => {
    await db.destroy();
  });

  const asUser = (key: string) => ({ 'x-api-key': key, 'x-project-id': String(projectId) });

  describe('infrastructure', () => {
    it('answers the health check without a key', async () => {
      const res = await supertest(app).get('/healthz');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.headers['x-request-id']).toEqual(expect.any(String));
    });

    it('requires an API key', async () => {
      const res = await supertest(app).get('/tickets').set('x-project-id', String(projectId));

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: { code: 'UNAUTHORIZED', message: 'API key required' } });
    });

    it('rejects unknown API keys', async () => {
      const res = await supertest(app).get('/tickets').set(asUser('test-secret'));

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } });
    });

    it('requires a project scope on ticket routes', async () => {
      const res = await supertest(app).get('/tickets').set('x-api-key', aliceKey);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'BAD_REQUEST', message: 'x-project-id header required' } });
    });

    it('rejects a malformed project scope', async () => {
      const res = await supertest(app).get('/tickets').set('x-api-key', aliceKey).set('x-project-id', 'abc');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('x-project-id header must be a positive integer');
    });

    it('keeps the status of body parser rejections', async () => {
      const res = await supertest(app)
        .post('/tickets')
        .set(asUser(aliceKey))
        .send({ title: 'Oversized', description: 'x'.repeat(200 * 1024) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: { code: 'PAYLOAD_TOO_LARGE', message: 'request entity too large' } });
    });

    it('rejects ids beyond the int4 range', async () => {
      const res = await supertest(app).get('/tickets/99999999999999999999').set(asUser(aliceKey));

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: { errors: [{ field: 'id', message: 'Id out of range', code: 'too_big' }] },
        },
      });
    });

    it('rejects out of range ids in bodies and headers', async () => {
      const reassign = await supertest(app)
        .patch('/tickets/1/assignee')
        .set(asUser(aliceKey))
        .send({ assigned_to: 2_147_483_648 });
      expect(reassign.status).toBe(400);
      expect(reassign.body.error.details).toEqual({
        errors: [{ field: 'assigned_to', message: 'Id out of range', code: 'too_big' }],
      });

      const scoped = await supertest(app)
        .get('/tickets')
        .set('x-api-key', aliceKey)
        .set('x-project-id', '2147483648');
      expect(scoped.status).toBe(400);
      expect(scoped.body.error.code).toBe('BAD_REQUEST');
    });

    it('answers 404 for unknown routes', async () => {
      const res = await supertest(app).get('/nowhere').set('x-api-key', aliceKey);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Route GET /nowhere not found' } });
    });
  });

  describe('tickets', () => {
    it('creates a ticket and reads it back', async () => {
      const created = await supertest(app)
        .post('/tickets')
        .set(asUser(aliceKey))
        .send({ title: 'Leaky tap', description: 'Kitchen', assigned_to_name: 'bob' });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({
        title: 'Leaky tap',
        status: 'open',
        type: 'worker',
        team_id: supportTeam,
        creator: { id: aliceId, name: 'Alice Admin' },
        assignee: { id: bobId, name: 'Bob Member' },
        worker_team: { id: workerTeam, name: 'Field Workers' },
      });

      const fetched = await supertest(app).get(`/tickets/${created.body.id}`).set(asUser(bobKey));
      expect(fetched.status).toBe(200);
      expect(fetched.body).toEqual(created.body);
    });

    it('applies the team_id query as the team override', async () => {
      const res = await supertest(app)
        .post(`/tickets?team_id=${workerTeam}`)
        .set(asUser(aliceKey))
        .send({ title: 'Override', description: 'x' });

      expect(res.status).toBe(201);
      expect(res.body.team_id).toBe(workerTeam);
    });

    it('reports validation failures per field', async () => {
      const res = await supertest(app).post('/tickets').set(asUser(aliceKey)).send({ description: 'x' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: { errors: [{ field: 'title', message: 'Required', code: 'invalid_type' }] },
        },
      });
    });

    it('rejects malformed JSON', async () => {
      const res = await supertest(app)
        .post('/tickets')
        .set(asUser(aliceKey))
        .set('content-type', 'application/json')
        .send('{"title":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: { code: 'INVALID_JSON', message: 'Invalid JSON in request body' } });
    });

    it('runs the lifecycle through the status and feedback routes', async () => {
      const created = await supertest(app)
        .post('/tickets')
        .set(asUser(aliceKey))
        .send({ title: 'Lifecycle', description: 'd', assigned_to: bobId });
      const id: number = created.body.id;

      const skipped = await supertest(app).patch(`/tickets/${id}/status`).set(asUser(bobKey)).send({ status: 'closed' });
      expect(skipped.status).toBe(400);
      expect(skipped.body.error.message).toBe('Cannot go from open to closed');

      const notAssignee = await supertest(app)
        .patch(`/tickets/${id}/status`)
        .set(asUser(aliceKey))
        .send({ status: 'in_progress' });
      expect(notAssignee.status).toBe(403);

      expect((await supertest(app).get('/tickets/assigned').set(asUser(bobKey))).body).toHaveLength(1);

      await supertest(app).patch(`/tickets/${id}/status`).set(asUser(bobKey)).send({ status: 'in_progress' });
      const closed = await supertest(app).patch(`/tickets/${id}/status`).set(asUser(bobKey)).send({ status: 'closed' });
      expect(closed.status).toBe(200);
      expect(closed.body.closed_at).toEqual(expect.any(String));

      expect((await supertest(app).get('/tickets/assigned').set(asUser(bobKey))).body).toEqual([]);

      const feedback = await supertest(app)
        .patch(`/tickets/${id}/feedback`)
        .set(asUser(aliceKey))
        .send({ feedback: 'Quick fix', confirmed: true });
      expect(feedback.status).toBe(200);
      expect(feedback.body.feedback).toBe('Quick fix');
      expect(feedback.body.confirmed).toBe(true);
    });

    it('lists tickets created by the caller', async () => {
      await supertest(app).post('/tickets').set(asUser(aliceKey)).send({ title: 'Mine', description: 'd' });
      await supertest(app).post('/tickets').set(asUser(bobKey)).send({ title: 'Theirs', description: 'd' });

      const mine = await supertest(app).get('/tickets/mine').set(asUser(bobKey));
      const all = await supertest(app).get('/tickets').set(asUser(bobKey));

      expect(mine.body.map((t: { title: string }) => t.title)).toEqual(['Theirs']);
      expect(all.body.map((t: { title: string }) => t.title)).toEqual(['Mine', 'Theirs']);
    });

    it('checks the new assignee for the admin role when reassigning', async () => {
      const created = await supertest(app).post('/tickets').set(asUser(aliceKey)).send({ title: 't', description: 'd' });

      const res = await supertest(app)
        .patch(`/tickets/${created.body.id}/assignee`)
        .set(asUser(aliceKey))
        .send({ assigned_to: bobId });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: { code: 'FORBIDDEN', message: 'Only project admin can reassign' } });
    });

    it('deletes a ticket for its creator', async () => {
      const created = await supertest(app).post('/tickets').set(asUser(bobKey)).send({ title: 't', description: 'd' });

      const res = await supertest(app).delete(`/tickets/${created.body.id}`).set(asUser(bobKey));
      expect(res.status).toBe(204);

      const missing = await supertest(app).get(`/tickets/${created.body.id}`).set(asUser(bobKey));
      expect(missing.status).toBe(404);
    });
  });

  describe('teams', () => {
    it('lists the caller teams', async () => {
      const res = await supertest(app).get('/teams').set('x-api-key', bobKey);

      expect(res.status).toBe(200);
      expect(res.body).toEqual([
        { id: supportTeam, name: 'Support', role: 'member', joined_at: '2026-01-02T09:00:00.000Z' },
      ]);
    });

    it('restricts team reads to members', async () => {
      const member = await supertest(app).get(`/teams/${supportTeam}/users`).set('x-api-key', bobKey);
      const outsider = await supertest(app).get(`/teams/${supportTeam}/users`).set('x-api-key', outsiderKey);

      expect(member.body).toEqual([
        { id: aliceId, name: 'Alice Admin' },
        { id: bobId, name: 'Bob Member' },
      ]);
      expect(outsider.status).toBe(403);
      expect(outsider.body.error.message).toBe('Team not available.');
    });

    it('returns a member with their project roles', async () => {
      const res = await supertest(app).get(`/teams/${supportTeam}/users/${bobId}`).set('x-api-key', aliceKey);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        user: { id: bobId, name: 'Bob Member' },
        role: 'member',
        joined_at: '2026-01-02T09:00:00.000Z',
        projects: [{ project_id: projectId, project_name: 'Portal', role: 'member' }],
      });
    });

    it('updates the caller availability', async () => {
      const res = await supertest(app)
        .put(`/teams/${supportTeam}/availability?is_available=false`)
        .set('x-api-key', bobKey);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id: bobId, name: 'Bob Member', is_available: false });

      const available = await supertest(app).get(`/teams/${supportTeam}/available-users`).set('x-api-key', aliceKey);
      expect(available.body).toEqual([]);
    });

    it('rejects a non-boolean availability', async () => {
      const res = await supertest(app).put(`/teams/${supportTeam}/availability?is_available=maybe`).set('x-api-key', bobKey);

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('adds and removes members', async () => {
      const added = await supertest(app)
        .post(`/teams/${supportTeam}/members/${outsiderId}?role=admin`)
        .set('x-api-key', aliceKey);
      expect(added.status).toBe(201);
      expect(added.body).toMatchObject({ user_id: outsiderId, team_id: supportTeam, role: 'admin' });

      const duplicate = await supertest(app).post(`/teams/${supportTeam}/members/${outsiderId}`).set('x-api-key', aliceKey);
      expect(duplicate.status).toBe(400);
      expect(duplicate.body.error.message).toBe('User already in team');

      const admins = await supertest(app).get(`/teams/${supportTeam}/available-admins`).set('x-api-key', bobKey);
      expect(admins.body).toEqual([
        { id: aliceId, name: 'Alice Admin' },
        { id: outsiderId, name: 'Olga Outsider' },
      ]);

      const removed = await supertest(app).delete(`/teams/${supportTeam}/members/${outsiderId}`).set('x-api-key', aliceKey);
      expect(removed.status).toBe(204);

      const again = await supertest(app).delete(`/teams/${supportTeam}/members/${outsiderId}`).set('x-api-key', aliceKey);
      expect(again.status).toBe(404);
    });

    it('requires the team admin role to manage members', async () => {
      const res = await supertest(app).post(`/teams/${supportTeam}/members/${outsiderId}`).set('x-api-key', bobKey);

      expect(res.status).toBe(403);
      expect(res.body.error.message).toBe('Requires team admin role.');
    });
  });
});
