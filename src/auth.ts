import crypto from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import type { AppConfig } from './config.js';

export type HttpError = Error & { statusCode: number };

export function httpError(statusCode: number, message: string): HttpError {
  return Object.assign(new Error(message), { statusCode });
}

function sha256(input: string): Buffer {
  return crypto.createHash('sha256').update(input, 'utf8').digest();
}

function bearerToken(request: FastifyRequest): string {
  const header = String(request.headers.authorization ?? '');
  const m = header.match(/^Bearer\s+(.+)$/i);
  return m ? m[1].trim() : '';
}

export function isAdmin(config: Pick<AppConfig, 'ADMIN_TOKEN'>, request: FastifyRequest): boolean {
  const expected = config.ADMIN_TOKEN.trim();
  if (!expected) return false;
  const presented = bearerToken(request);
  if (!presented) return false;
  // Compare fixed-length digests so the check does not leak the token length.
  return crypto.timingSafeEqual(sha256(presented), sha256(expected));
}

export function requireAdmin(config: Pick<AppConfig, 'ADMIN_TOKEN'>, request: FastifyRequest): void {
  if (!isAdmin(config, request)) throw httpError(401, 'Unauthorized');
}
