import 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    // Used for auth
    userId?: string;
  }
}
