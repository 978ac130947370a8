import type { INestApplication } from '@nestjs/common';
import request from 'supertest';

/**
 * HTTP request helpers. Each one sets the JSON content type and, when a
 * token is given, the bearer `Authorization` header.
 */

function withAuth(test: request.Test, token?: string): request.Test {
  return token ? test.set('Authorization', `Bearer ${token}`) : test;
}

export function apiPost(app: INestApplication, path: string, body: object, token?: string): request.Test {
  return withAuth(request(app.getHttpServer()).post(path), token)
    .set('Content-Type', 'application/json')
    .send(body);
}

export function apiGet(app: INestApplication, path: string, token?: string): request.Test {
  return withAuth(request(app.getHttpServer()).get(path), token).set('Accept', 'application/json');
}

export function apiPatch(app: INestApplication, path: string, body: object, token?: string): request.Test {
  return withAuth(request(app.getHttpServer()).patch(path), token)
    .set('Content-Type', 'application/json')
    .send(body);
}

export function apiDelete(app: INestApplication, path: string, token?: string): request.Test {
  return withAuth(request(app.getHttpServer()).delete(path), token);
}
