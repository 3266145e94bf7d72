import { FastifyInstance } from 'fastify';
import type { DataSource } from 'typeorm';

import snippets from './snippets';
import users from './users';

export default async function (
  fastify: FastifyInstance,
  { con }: { con: DataSource },
): Promise<void> {
  fastify.register(snippets, { prefix: '/snippets', con });
  fastify.register(users, { prefix: '/users', con });

  fastify.get('/', (req, res) => {
    return res.send({
      snippets: '/snippets',
      users: '/users',
      graphql: '/graphql',
    });
  });
}
