import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { createApp, buildCorsOptions } from '../app';
import { errorHandler } from '../middleware/error-handler';
import { ActivityStore } from '../services/activity-store';
import { loadDefaultActivities } from '../data/seed-activities';

const makeStore = () => new ActivityStore(loadDefaultActivities());

const makeApp = (allowedOrigins: string, store: ActivityStore = makeStore()) =>
  createApp({ store, config: { allowedOrigins } });

describe('application shell', () => {
  it('GET / lists the endpoints as plain text', async () => {
    const response = await request(makeApp('*')).get('/').expect(200);

    expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(response.text.split('\n')).toEqual([
      'Mergington High School Activities API',
      'GET /activities',
      'POST /activities/{activityName}/signup?email={email}',
      'DELETE /activities/{activityName}/unregister?email={email}',
    ]);
  });

  it('answers unknown routes with a JSON 404', async () => {
    const response = await request(makeApp('*')).get('/activities/Chess%20Club').expect(404);
    expect(response.body).toEqual({ detail: 'Not Found' });
  });

  it('answers an unsupported method on a known path with a JSON 404', async () => {
    const response = await request(makeApp('*')).get('/activities/Chess%20Club/signup').expect(404);
    expect(response.body).toEqual({ detail: 'Not Found' });
  });

  it('matches route paths case-sensitively', async () => {
    const store = makeStore();
    const response = await request(makeApp('*', store))
      .post('/ACTIVITIES/Chess%20Club/SIGNUP?email=x%40mergington.edu')
      .expect(404);

    expect(response.body).toEqual({ detail: 'Not Found' });
    expect(store.hasParticipant('Chess Club', 'x@mergington.edu')).toBe(false);
  });

  it('does not match a trailing slash', async () => {
    const store = makeStore();
    const response = await request(makeApp('*', store))
      .post('/activities/Chess%20Club/signup/?email=x%40mergington.edu')
      .expect(404);

    expect(response.body).toEqual({ detail: 'Not Found' });
    expect(store.hasParticipant('Chess Club', 'x@mergington.edu')).toBe(false);
  });

  it('ignores a request body on signup', async () => {
    const store = makeStore();
    const response = await request(makeApp('*', store))
      .post('/activities/Chess%20Club/signup?email=x%40mergington.edu')
      .set('Content-Type', 'application/json')
      .send('{')
      .expect(200);

    expect(response.body).toEqual({ message: 'Signed up x@mergington.edu for Chess Club' });
    expect(store.hasParticipant('Chess Club', 'x@mergington.edu')).toBe(true);
  });

  it('answers a badly percent-encoded activity name with 400', async () => {
    const response = await request(makeApp('*'))
      .post('/activities/%E0%A4%A/signup?email=x%40mergington.edu')
      .expect(400);

    expect(response.body).toEqual({ detail: "Failed to decode param '%E0%A4%A'" });
  });
});

describe('errorHandler', () => {
  it('passes through client errors raised by other middleware', async () => {
    const app = express();
    app.use(express.json());
    app.post('/echo', (req, res) => {
      res.json(req.body);
    });
    app.use(errorHandler);

    const response = await request(app)
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{')
      .expect(400);

    expect(typeof response.body.detail).toBe('string');
    expect(response.body.detail).not.toBe('Internal server error');
  });

  it('reads statusCode when status is absent', async () => {
    const app = express();
    app.get('/teapot', (_req, _res, next) => {
      next(Object.assign(new Error('No coffee here'), { statusCode: 418 }));
    });
    app.use(errorHandler);

    const response = await request(app).get('/teapot').expect(418);
    expect(response.body).toEqual({ detail: 'No coffee here' });
  });

  it('hides the message of server errors', async () => {
    const app = express();
    app.get('/boom', () => {
      throw Object.assign(new Error('database exploded'), { status: 503 });
    });
    app.use(errorHandler);

    const response = await request(app).get('/boom').expect(500);
    expect(response.body).toEqual({ detail: 'Internal server error' });
  });
});

describe('CORS', () => {
  it('allows every origin with *', async () => {
    const response = await request(makeApp('*'))
      .get('/activities')
      .set('Origin', 'https://anywhere.example')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe('*');
  });

  it('reflects an origin from the allow list', async () => {
    const response = await request(makeApp('https://school.example, https://admin.example'))
      .get('/activities')
      .set('Origin', 'https://admin.example')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe('https://admin.example');
  });

  it('rejects an origin outside the allow list', async () => {
    const response = await request(makeApp('https://school.example'))
      .get('/activities')
      .set('Origin', 'https://elsewhere.example')
      .expect(403);

    expect(response.body).toEqual({ detail: 'Not allowed by CORS' });
  });

  it('allows requests without an Origin header', async () => {
    await request(makeApp('https://school.example')).get('/activities').expect(200);
  });

  it('builds a fixed wildcard origin for *', () => {
    expect(buildCorsOptions('*')).toEqual({ origin: '*' });
  });
});
