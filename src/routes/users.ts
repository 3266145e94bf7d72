import type { FastifyInstance } from 'fastify';
import type { DataSource } from 'typeorm';
import { USERS_MAX_PAGE_SIZE, USERS_PAGE_SIZE } from '../config';
import { executeGraphql } from './graphqlExecutor';
import {
  Connection,
  PAGE_INFO_FIELDS,
  parseLimit,
  toPagination,
  toUserResponse,
  USER_FIELDS,
  UserNode,
} from './common';

const USERS_QUERY = `
  query RestUsers($first: Int, $after: String) {
    users(first: $first, after: $after) {
      edges {
        node {
          ${USER_FIELDS}
        }
      }
      ${PAGE_INFO_FIELDS}
    }
  }
`;

const USER_QUERY = `
  query RestUser($id: ID!) {
    user(id: $id) {
      ${USER_FIELDS}
    }
  }
`;

interface UsersResponse {
  users: Connection<UserNode>;
}

interface UserResponse {
  user: UserNode;
}

export default async function (
  fastify: FastifyInstance,
  { con }: { con: DataSource },
): Promise<void> {
  fastify.get<{ Querystring: { limit?: string; cursor?: string } }>(
    '/',
    async (request, reply) =>
      executeGraphql(
        con,
        {
          query: USERS_QUERY,
          variables: {
            first: parseLimit(
              request.query.limit,
              USERS_PAGE_SIZE,
              USERS_MAX_PAGE_SIZE,
            ),
            after: request.query.cursor ?? null,
          },
        },
        (json) => {
          const { users } = json as unknown as UsersResponse;
          return {
            data: users.edges.map(({ node }) => toUserResponse(node)),
            pagination: toPagination(users),
          };
        },
        request,
        reply,
      ),
  );

  fastify.get<{ Params: { id: string } }>('/:id', async (request, reply) =>
    executeGraphql(
      con,
      {
        query: USER_QUERY,
        variables: { id: request.params.id },
      },
      (json) => toUserResponse((json as unknown as UserResponse).user),
      request,
      reply,
    ),
  );
}
