import './types';
import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { jwtConfig } from './config';

export type AccessToken = { token: string; expiresIn: Date };

interface Options {
  secret?: string;
}

const authPayloadSchema = z.object({
  userId: z.string().min(1),
  exp: z.number(),
});

type AuthPayload = z.infer<typeof authPayloadSchema>;

export const verifyJwt = (token: string): Promise<AuthPayload | null> =>
  new Promise((resolve, reject) => {
    jwt.verify(
      token,
      jwtConfig.secret,
      {
        algorithms: ['HS256'],
        audience: jwtConfig.audience,
        issuer: jwtConfig.issuer,
      },
      (err, payload) => {
        if (err) {
          return reject(err);
        }
        const parsed = authPayloadSchema.safeParse(payload);
        return resolve(parsed.success ? parsed.data : null);
      },
    );
  });

const DEFAULT_JWT_EXPIRATION = 30 * 24 * 60 * 60 * 1000;
export const signJwt = (
  payload: { userId: string },
  expiration = DEFAULT_JWT_EXPIRATION,
): Promise<AccessToken> =>
  new Promise((resolve, reject) => {
    if (!jwtConfig.secret) {
      return reject(new Error('JWT_SECRET is not configured'));
    }
    const expiresIn = new Date(Date.now() + expiration);
    jwt.sign(
      { ...payload, exp: Math.floor(expiresIn.getTime() / 1000) },
      jwtConfig.secret,
      {
        algorithm: 'HS256',
        audience: jwtConfig.audience,
        issuer: jwtConfig.issuer,
      },
      (err, token) => {
        if (err || !token) {
          return reject(err ?? new Error('failed to sign token'));
        }
        return resolve({
          token,
          expiresIn,
        });
      },
    );
  });

const plugin = async (
  fastify: FastifyInstance,
  opts: Options,
): Promise<void> => {
  fastify.decorateRequest('userId', undefined);
  fastify.addHook('preHandler', async (req) => {
    // Machine-to-machine authentication
    if (
      opts.secret &&
      req.headers['authorization'] === `Service ${opts.secret}`
    ) {
      const userId = req.headers['user-id'];
      if (typeof userId === 'string' && req.headers['logged-in'] === 'true') {
        req.userId = userId;
      }
      return;
    }
    delete req.headers['user-id'];
    delete req.headers['logged-in'];

    const authorization = req.headers['authorization'];
    if (!jwtConfig.secret || !authorization?.startsWith('Bearer ')) {
      return;
    }
    const token = authorization.substring(7);
    try {
      const payload = await verifyJwt(token);
      if (payload) {
        req.userId = payload.userId;
      }
    } catch (err) {
      // An invalid token leaves the request anonymous
      req.log.debug({ err }, 'failed to verify access token');
    }
  });
};

export default fp(plugin, {
  name: 'authentication',
});
