import type { FastifyReply, FastifyRequest } from 'fastify';
import jwt from 'jsonwebtoken';
import type { Algorithm, JwtPayload } from 'jsonwebtoken';
import type { Services } from '../services/index.js';
import { forbidden, unauthorized } from '../utils/errors.js';

/** Resolves the username a request is made on behalf of, or throws UNAUTHORIZED. */
export type Authenticator = (request: FastifyRequest) => Promise<string>;

declare module 'fastify' {
  interface FastifyRequest {
    username: string | null;
  }

  interface FastifyInstance {
    services: Services;
    authenticate: Authenticator;
  }
}

const JWT_ALGORITHMS: Algorithm[] = [
  'HS256', 'HS384', 'HS512',
  'RS256', 'RS384', 'RS512',
  'ES256', 'ES384', 'ES512',
  'PS256', 'PS384', 'PS512',
];

export function parseJwtAlgorithm(value: string): Algorithm {
  const algorithm = JWT_ALGORITHMS.find((candidate) => candidate === value);
  if (!algorithm) {
    throw new Error(`Unsupported JWT algorithm: ${value}`);
  }
  return algorithm;
}

function verifyToken(token: string, key: string, algorithm: Algorithm): Promise<string | JwtPayload> {
  return new Promise((resolve, reject) => {
    jwt.verify(token, key, { algorithms: [algorithm] }, (err, payload) => {
      if (err) {
        reject(unauthorized(`Invalid token: ${err.message}`));
        return;
      }
      if (payload === undefined) {
        reject(unauthorized('Invalid token'));
        return;
      }
      resolve(payload);
    });
  });
}

/**
 * Bearer-token authenticator. The username is the token's `sub` claim; the
 * token is issued by a separate authentication service sharing `key`.
 */
export function createJwtAuthenticator(options: { key: string; algorithm: Algorithm }): Authenticator {
  return async (request) => {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw unauthorized('Authentication required');
    }

    const payload = await verifyToken(header.slice('Bearer '.length).trim(), options.key, options.algorithm);
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw unauthorized('Token does not identify a user');
    }
    return payload.sub;
  };
}

export async function requireAuth(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
  request.username = await request.server.authenticate(request);
}

export function currentUsername(request: FastifyRequest): string {
  if (!request.username) {
    throw unauthorized('Authentication required');
  }
  return request.username;
}

// Must run after requireAuth.
export async function requireAdmin(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
  const username = currentUsername(request);
  if (!(await request.server.services.users.isAdmin(username))) {
    throw forbidden('Admin privileges required');
  }
}
