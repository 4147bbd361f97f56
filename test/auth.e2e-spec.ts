import type { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { createTestApp } from './support/create-test-app';

describe('Token endpoint (e2e)', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('issues a bearer token for valid client credentials', async () => {
    const res = await request(app.getHttpServer())
      .post('/integration/box/1.0/token')
      .send({
        client_id: 'test-client',
        client_secret: 'test-secret',
        grant_type: 'client_credentials',
      })
      .expect(200);

    expect(res.body).toEqual({
      access_token: expect.any(String),
      token_type: 'Bearer',
      expires_in: 86400,
    });
  });

  it('accepts a form-encoded grant', async () => {
    await request(app.getHttpServer())
      .post('/integration/box/1.0/token')
      .type('form')
      .send('client_id=test-client&client_secret=test-secret&grant_type=client_credentials')
      .expect(200);
  });

  it('answers 401 for a wrong secret', async () => {
    const res = await request(app.getHttpServer())
      .post('/integration/box/1.0/token')
      .send({
        client_id: 'test-client',
        client_secret: 'wrong-secret',
        grant_type: 'client_credentials',
      })
      .expect(401);

    expect(res.body).toEqual({
      error: 'AuthenticationError',
      message: 'Invalid client credentials',
      details: {},
    });
  });

  it('answers 422 for another grant type', async () => {
    const res = await request(app.getHttpServer())
      .post('/integration/box/1.0/token')
      .send({
        client_id: 'test-client',
        client_secret: 'test-secret',
        grant_type: 'password',
      })
      .expect(422);

    expect(res.body).toEqual({
      error: 'ValidationError',
      message: 'Request validation failed',
      details: {
        fields: [
          {
            field: 'grant_type',
            problems: ['grant_type must be client_credentials'],
          },
        ],
      },
    });
  });

  it('answers 422 for a body without credentials', async () => {
    const res = await request(app.getHttpServer())
      .post('/integration/box/1.0/token')
      .send({ grant_type: 'client_credentials' })
      .expect(422);

    expect(res.body.error).toBe('ValidationError');
  });
});
