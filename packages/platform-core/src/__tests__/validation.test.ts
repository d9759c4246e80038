import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z } from 'zod';
import { createValidation, validatedParams, validatedQuery } from '../middleware/validation';

const { validateBody, validateQuery, validateParams } = createValidation('test-service');

const BodySchema = z.object({ name: z.string().min(1), count: z.number().int().default(1) });
const QuerySchema = z.object({ limit: z.coerce.number().int().max(50).default(10) });
const ParamsSchema = z.object({ userId: z.string().min(3) });

function buildApp() {
  const app = express();
  app.use(express.json());
  app.post('/items', validateBody(BodySchema), (req, res) => {
    res.json(req.body);
  });
  app.get('/items', validateQuery(QuerySchema), (_req, res) => {
    const query = validatedQuery(res, QuerySchema);
    res.json({ limit: query.limit, type: typeof query.limit });
  });
  app.get('/users/:userId', validateParams(ParamsSchema), (_req, res) => {
    res.json(validatedParams(res, ParamsSchema));
  });
  return app;
}

describe('validation middleware', () => {
  it('should replace the body with parsed output', async () => {
    const response = await request(buildApp()).post('/items').send({ name: 'coffee' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ name: 'coffee', count: 1 });
  });

  it('should reject an invalid body with field details', async () => {
    const response = await request(buildApp()).post('/items').send({ name: '' });

    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
    expect(response.body.error.message).toBe('Request body validation failed');
    expect(response.body.error.details.errors[0].field).toBe('name');
    expect(response.body.error.details.service).toBe('test-service');
  });

  it('should expose coerced query values', async () => {
    const response = await request(buildApp()).get('/items?limit=25');

    expect(response.body).toEqual({ limit: 25, type: 'number' });
  });

  it('should reject out-of-range query values', async () => {
    const response = await request(buildApp()).get('/items?limit=500');

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('Query parameters validation failed');
  });

  it('should validate path params', async () => {
    const ok = await request(buildApp()).get('/users/user-1');
    const rejected = await request(buildApp()).get('/users/ab');

    expect(ok.body).toEqual({ userId: 'user-1' });
    expect(rejected.status).toBe(400);
    expect(rejected.body.error.message).toBe('URL parameters validation failed');
  });
});
