import request from 'supertest';
import { DataSource, DeepPartial, ObjectLiteral, ObjectType } from 'typeorm';
import { FastifyInstance, FastifyRequest } from 'fastify';
import { GraphQLFormattedError } from 'graphql';
import { createMercuriusTestClient } from 'mercurius-integration-testing';
import appFunc from '../src';
import { Context } from '../src/Context';
import { createSnippet } from '../src/common';
import { Snippet } from '../src/entity';
import { snippetsFixture } from './fixture/snippet';

export class MockContext extends Context {
  mockUserId: string | null;

  constructor(req: FastifyRequest, con: DataSource, userId: string | null) {
    super(req, con);
    this.mockUserId = userId;
  }

  get userId(): string | undefined {
    return this.mockUserId ?? undefined;
  }
}

export type GraphQLTestClient = ReturnType<typeof createMercuriusTestClient>;
export type GraphQLTestingState = {
  app: FastifyInstance;
  client: GraphQLTestClient;
};

export const initializeGraphQLTesting = async (
  contextFn: (request: FastifyRequest) => Context,
): Promise<GraphQLTestingState> => {
  const app = await appFunc(contextFn);
  const client = createMercuriusTestClient(app);
  await app.ready();
  return { app, client };
};

export const disposeGraphQLTesting = async ({
  app,
}: GraphQLTestingState): Promise<void> => {
  await app.close();
};

export const authorizeRequest = (
  req: request.Test,
  userId = '1',
): request.Test =>
  req
    .set('authorization', `Service ${process.env.ACCESS_SECRET}`)
    .set('user-id', userId)
    .set('logged-in', 'true');

export type Mutation = {
  mutation: string;
  variables?: Record<string, unknown>;
};

export type Query = {
  query: string;
  variables?: Record<string, unknown>;
};

export const testMutationError = async (
  client: GraphQLTestClient,
  mutation: Mutation,
  callback: (errors: readonly GraphQLFormattedError[]) => void | Promise<void>,
): Promise<void> => {
  const res = await client.mutate(mutation.mutation, {
    variables: mutation.variables,
  });
  return callback(res.errors ?? []);
};

export const testMutationErrorCode = async (
  client: GraphQLTestClient,
  mutation: Mutation,
  code: string,
  message?: string,
): Promise<void> =>
  testMutationError(client, mutation, (errors) => {
    expect(errors.length).toEqual(1);
    expect(errors[0].extensions?.code).toEqual(code);
    if (message) {
      expect(errors[0].message).toEqual(message);
    }
  });

export const testQueryError = async (
  client: GraphQLTestClient,
  query: Query,
  callback: (errors: readonly GraphQLFormattedError[]) => void | Promise<void>,
): Promise<void> => {
  const res = await client.query(query.query, { variables: query.variables });
  return callback(res.errors ?? []);
};

export const testQueryErrorCode = async (
  client: GraphQLTestClient,
  query: Query,
  code: string,
  message?: string,
): Promise<void> =>
  testQueryError(client, query, (errors) => {
    expect(errors.length).toEqual(1);
    expect(errors[0].extensions?.code).toEqual(code);
    if (message) {
      expect(errors[0].message).toEqual(message);
    }
  });

export async function saveFixtures<Entity extends ObjectLiteral>(
  con: DataSource,
  target: ObjectType<Entity>,
  entities: DeepPartial<Entity>[],
): Promise<void> {
  await con.getRepository(target).save(
    entities.map((e) => {
      con.getRepository(target).create(e);
      return e;
    }),
  );
}

/**
 * Snippets go through the store so their highlighted document is rendered.
 * They are created one by one to keep their creation order.
 */
export const saveSnippetFixtures = async (
  con: DataSource,
  fixtures = snippetsFixture,
): Promise<Snippet[]> => {
  const snippets: Snippet[] = [];
  for (const { ownerId, ...input } of fixtures) {
    snippets.push(await createSnippet(con, input, ownerId));
  }
  return snippets;
};
