import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AxiosError } from 'axios';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { setupApp } from '../src/app.setup';
import { gatewayConfig } from '../src/config/gateway.config';
import { UPSTREAM_HTTP } from '../src/upstream/upstream.http';
import { FakeUpstream, TEST_CONFIG, createFakeUpstream } from './fake-upstream';

describe('Gateway (e2e)', () => {
  let app: INestApplication;
  let upstream: FakeUpstream;

  beforeAll(async () => {
    upstream = createFakeUpstream(TEST_CONFIG);
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(gatewayConfig.KEY)
      .useValue(TEST_CONFIG)
      .overrideProvider(UPSTREAM_HTTP)
      .useValue(upstream.http)
      .compile();
    app = setupApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    upstream.calls.length = 0;
    upstream.reply(() => ({ status: 200, body: { content: [] } }));
  });

  function server() {
    return app.getHttpServer();
  }

  describe('GET /api/resources', () => {
    it('forwards the default query and returns the upstream body', async () => {
      upstream.reply(() => ({ status: 200, body: [{ id: 1, name: 'Room A' }] }));

      const res = await request(server()).get('/api/resources').expect(200);

      expect(res.body).toEqual([{ id: 1, name: 'Room A' }]);
      expect(upstream.calls).toHaveLength(1);
      expect(upstream.calls[0]).toMatchObject({
        method: 'GET',
        url: '/api/resources',
        params: { activeOnly: 'true' },
      });
    });

    it('forwards exactly the filters that are present', async () => {
      await request(server())
        .get('/api/resources')
        .query({ activeOnly: 'false', resourceType: 'room' })
        .expect(200);

      expect(upstream.calls[0].params).toEqual({ activeOnly: 'false', resourceType: 'room' });
    });

    it('builds the same upstream query for repeated requests', async () => {
      const path = '/api/resources?activeOnly=true&serviceOffering=8';
      await request(server()).get(path).expect(200);
      await request(server()).get(path).expect(200);

      expect(upstream.calls).toHaveLength(2);
      expect(upstream.calls[0].params).toEqual({ activeOnly: 'true', serviceOffering: '8' });
      expect(upstream.calls[1].params).toEqual(upstream.calls[0].params);
    });

    it.each([
      ['True', 'true'],
      ['FALSE', 'false'],
      ['yes', 'true'],
      ['Off', 'false'],
    ])('reads activeOnly=%s as %s', async (spelling, forwarded) => {
      await request(server()).get(`/api/resources?activeOnly=${spelling}`).expect(200);

      expect(upstream.calls[0].params).toEqual({ activeOnly: forwarded });
    });

    it('rejects a non-boolean activeOnly', async () => {
      const res = await request(server()).get('/api/resources?activeOnly=maybe').expect(400);

      expect(res.body).toEqual({ detail: 'activeOnly must be a boolean' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('passes an upstream json error through with its status', async () => {
      upstream.reply(() => ({ status: 404, body: { error: 'not found' } }));

      const res = await request(server()).get('/api/resources').expect(404);

      expect(res.body).toEqual({ detail: { error: 'not found' } });
      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    });

    it('passes a non-json upstream error through as text', async () => {
      upstream.reply(() => ({ status: 502, body: 'Bad gateway' }));

      const res = await request(server()).get('/api/resources').expect(502);

      expect(res.body).toEqual({ detail: 'Bad gateway' });
    });

    it('answers 503 when upstream is unreachable', async () => {
      upstream.reply((req) => new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', req));

      const res = await request(server()).get('/api/resources').expect(503);

      expect(res.body).toEqual({ detail: 'Service unavailable: connect ECONNREFUSED 127.0.0.1:443' });
    });

    it('answers 500 for unexpected failures', async () => {
      upstream.reply(() => new Error('boom'));

      const res = await request(server()).get('/api/resources').expect(500);

      expect(res.body).toEqual({ detail: 'Internal server error: boom' });
    });
  });

  describe('POST /api/resources', () => {
    it('injects the fixed category and returns the upstream status', async () => {
      upstream.reply(() => ({ status: 201, body: { id: 99 } }));

      const res = await request(server())
        .post('/api/resources')
        .send({ name: 'Room A', description: 'Second floor', colour: 'blue' })
        .expect(201);

      expect(res.body).toEqual({ id: 99 });
      expect(upstream.calls[0]).toMatchObject({
        method: 'POST',
        url: '/api/resources',
        apiKey: 'test-secret',
        body: {
          name: 'Room A',
          description: 'Second floor',
          externalId: '9',
          resourceType: { id: 25 },
          serviceOffering: { id: 8 },
        },
      });
    });

    it('requires a name before calling upstream', async () => {
      const res = await request(server())
        .post('/api/resources')
        .send({ description: 'Second floor' })
        .expect(400);

      expect(res.body).toEqual({ detail: 'name is required' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('treats a whitespace-only name as missing', async () => {
      const res = await request(server())
        .post('/api/resources')
        .send({ name: '   ', description: 'Second floor' })
        .expect(400);

      expect(res.body).toEqual({ detail: 'name is required' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('requires a description before calling upstream', async () => {
      const res = await request(server()).post('/api/resources').send({ name: 'Room A', description: '' }).expect(400);

      expect(res.body).toEqual({ detail: 'description is required' });
      expect(upstream.calls).toHaveLength(0);
    });
  });

  describe('GET /api/schedules', () => {
    it('always sends page and sort', async () => {
      await request(server()).get('/api/schedules').expect(200);

      expect(upstream.calls[0]).toMatchObject({
        url: '/api/schedules',
        params: { page: 1, sort: 'id,asc' },
      });
    });

    it('forwards explicit paging', async () => {
      await request(server()).get('/api/schedules?page=3&sort=start,desc').expect(200);

      expect(upstream.calls[0].params).toEqual({ page: 3, sort: 'start,desc' });
    });

    it('rejects a non-integer page', async () => {
      const res = await request(server()).get('/api/schedules?page=two').expect(400);

      expect(res.body).toEqual({ detail: 'page must be an integer' });
      expect(upstream.calls).toHaveLength(0);
    });

    it.each([['page='], ['page=%20'], ['page=1.5'], ['page=0x10']])('rejects %s', async (param) => {
      const res = await request(server()).get(`/api/schedules?${param}`).expect(400);

      expect(res.body).toEqual({ detail: 'page must be an integer' });
      expect(upstream.calls).toHaveLength(0);
    });
  });

  describe('POST /api/schedules', () => {
    const timeslot = { start: '2025-03-01T09:00:00Z', end: '2025-03-01T10:00:00Z' };

    it('forwards only the first resource id and the timeslot', async () => {
      upstream.reply(() => ({ status: 201, body: { id: 500 } }));

      const res = await request(server())
        .post('/api/schedules')
        .send({
          resources: [{ id: '7', label: 'Room A' }, { id: 8 }],
          timeslot: { ...timeslot, timezone: 'UTC' },
          notes: 'dropped',
        })
        .expect(201);

      expect(res.body).toEqual({ id: 500 });
      expect(upstream.calls[0].body).toEqual({ resources: [{ id: 7 }], timeslot });
    });

    it('rejects empty resources', async () => {
      const res = await request(server()).post('/api/schedules').send({ resources: [], timeslot }).expect(400);

      expect(res.body).toEqual({ detail: 'resources must contain at least one entry' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('rejects missing resources', async () => {
      const res = await request(server()).post('/api/schedules').send({ timeslot }).expect(400);

      expect(res.body).toEqual({ detail: 'resources must contain at least one entry' });
    });

    it('rejects a missing timeslot', async () => {
      const res = await request(server()).post('/api/schedules').send({ resources: [{ id: 1 }] }).expect(400);

      expect(res.body).toEqual({ detail: 'timeslot is required' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('rejects a timeslot without bounds', async () => {
      const res = await request(server())
        .post('/api/schedules')
        .send({ resources: [{ id: 1 }], timeslot: {} })
        .expect(400);

      expect(res.body).toEqual({ detail: 'timeslot.start is required' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('rejects a timeslot without an end', async () => {
      const res = await request(server())
        .post('/api/schedules')
        .send({ resources: [{ id: 1 }], timeslot: { start: timeslot.start } })
        .expect(400);

      expect(res.body).toEqual({ detail: 'timeslot.end is required' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('rejects a non-integer resource id', async () => {
      const res = await request(server())
        .post('/api/schedules')
        .send({ resources: [{ id: 'abc' }], timeslot })
        .expect(400);

      expect(res.body).toEqual({ detail: 'Invalid resource ID: abc' });
      expect(upstream.calls).toHaveLength(0);
    });
  });

  describe('PUT /api/schedules/:scheduleId/status', () => {
    it('strips the event_ prefix and forwards the cancellation', async () => {
      upstream.reply(() => ({ status: 200, body: { id: 42, status: 'CANCELLED' } }));

      const res = await request(server())
        .put('/api/schedules/event_42/status')
        .send({ status: 'CANCELLED' })
        .expect(200);

      expect(res.body).toEqual({ id: 42, status: 'CANCELLED' });
      expect(upstream.calls[0]).toMatchObject({
        method: 'PUT',
        url: '/api/schedules/42/status',
        body: { id: 42, status: 'CANCELLED' },
      });
    });

    it('names the raw id when it is not numeric', async () => {
      const res = await request(server())
        .put('/api/schedules/notanumber/status')
        .send({ status: 'CANCELLED' })
        .expect(400);

      expect(res.body).toEqual({ detail: 'Invalid schedule ID: notanumber' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('only accepts CANCELLED', async () => {
      const res = await request(server()).put('/api/schedules/42/status').send({ status: 'ACTIVE' }).expect(400);

      expect(res.body).toEqual({ detail: 'status must be CANCELLED' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('requires a status', async () => {
      const res = await request(server()).put('/api/schedules/42/status').send({}).expect(400);

      expect(res.body).toEqual({ detail: 'status is required' });
    });
  });

  describe('diagnostics', () => {
    it('serves test-cors outside the api prefix without calling upstream', async () => {
      const res = await request(server()).get('/test-cors').expect(200);

      expect(res.body).toEqual({ message: 'CORS is working properly!' });
      expect(upstream.calls).toHaveLength(0);
    });

    it('reports a working upstream connection', async () => {
      const res = await request(server()).get('/api/check-connection').expect(200);

      expect(res.body).toEqual({
        status: 'success',
        message: 'Connection to upstream API successful',
        url: 'https://upstream.test/api/resources',
      });
    });

    it('reports a failing upstream connection with 200', async () => {
      upstream.reply((req) => new AxiosError('getaddrinfo ENOTFOUND upstream.test', 'ENOTFOUND', req));

      const res = await request(server()).get('/api/check-connection').expect(200);

      expect(res.body).toEqual({
        status: 'error',
        message: 'Connection failed: Service unavailable: getaddrinfo ENOTFOUND upstream.test',
      });
    });

    it('answers a plain OPTIONS on schedules with an empty object', async () => {
      const res = await request(server()).options('/api/schedules').expect(200);

      expect(res.body).toEqual({});
    });
  });

  describe('CORS', () => {
    it('answers browser preflights before routing', async () => {
      const res = await request(server())
        .options('/api/resources')
        .set('Origin', 'http://localhost:5173')
        .set('Access-Control-Request-Method', 'POST')
        .expect(200);

      expect(res.text).toBe('OK');
      expect(res.headers['access-control-allow-methods']).toBe('GET, POST, PUT, DELETE, OPTIONS');
      expect(upstream.calls).toHaveLength(0);
    });

    it('echoes an allowed origin', async () => {
      const res = await request(server()).get('/test-cors').set('Origin', 'http://localhost:3000').expect(200);

      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
      expect(res.headers['access-control-allow-credentials']).toBe('true');
      expect(res.headers['access-control-allow-headers']).toBe('*');
    });

    it('falls back to the first configured origin', async () => {
      const res = await request(server()).get('/test-cors').set('Origin', 'http://elsewhere.test').expect(200);

      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    });

    it('keeps the headers on validation errors and unknown routes', async () => {
      const invalid = await request(server()).post('/api/resources').send({}).expect(400);
      const missing = await request(server()).get('/api/unknown').expect(404);

      expect(invalid.headers['access-control-allow-origin']).toBe('http://localhost:5173');
      expect(missing.headers['access-control-allow-origin']).toBe('http://localhost:5173');
      expect(missing.body).toEqual({ detail: 'Cannot GET /api/unknown' });
    });

    it('keeps the headers when the json body cannot be parsed', async () => {
      const res = await request(server())
        .post('/api/resources')
        .set('Content-Type', 'application/json')
        .send('{"name":')
        .expect(400);

      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:5173');
      expect(typeof res.body.detail).toBe('string');
      expect(upstream.calls).toHaveLength(0);
    });

    it('tags every response with a request id', async () => {
      const res = await request(server()).get('/test-cors').set('X-Request-Id', 'req-1').expect(200);

      expect(res.headers['x-request-id']).toBe('req-1');
    });
  });
});
