import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { z } from 'zod';
import { validate } from '../validate.js';
import { errorHandler } from '../error-handler.js';

describe('validate middleware', () => {
  it('should assign the parsed payload to req.body', async () => {
    const app = express();
    app.use(express.json());
    app.post('/', validate(z.object({ limit: z.coerce.number().min(1).max(10) })), (req, res) => {
      res.json({ limit: req.body.limit });
    });
    app.use(errorHandler);

    const response = await request(app).post('/').send({ limit: '5' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ limit: 5 });
  });

  it('should apply schema transforms before the handler runs', async () => {
    const app = express();
    app.use(express.json());
    app.post('/', validate(z.object({ name: z.string().trim() })), (req, res) => {
      res.json({ name: req.body.name });
    });
    app.use(errorHandler);

    const response = await request(app).post('/').send({ name: '  Mailbag  ' });

    expect(response.body).toEqual({ name: 'Mailbag' });
  });

  it('should report an invalid payload as a validation error', async () => {
    const app = express();
    app.use(express.json());
    app.post('/', validate(z.object({ limit: z.coerce.number().min(1) })), (_req, res) => {
      res.status(201).json({});
    });
    app.use(errorHandler);

    const response = await request(app).post('/').send({ limit: 'not-a-number' });

    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
    expect(response.body.code).toBe('VALIDATION_ERROR');
    expect(response.body.details[0].path).toEqual(['limit']);
  });
});
