import { execute, parse, DocumentNode, GraphQLError } from 'graphql';
import type { FastifyRequest, FastifyReply } from 'fastify';
import type { DataSource } from 'typeorm';
import { EntityNotFoundError } from 'typeorm';
import { Context } from '../Context';
import { schema } from '../graphql';

export interface GraphqlPayload {
  query: string;
  variables?: Record<string, unknown>;
}

export interface ExecuteGraphqlOptions {
  // Status sent along a non-empty response body
  statusCode?: number;
}

// Cache for parsed queries to avoid re-parsing
const queryCache = new Map<string, DocumentNode>();

const parseQuery = (query: string): DocumentNode => {
  const cached = queryCache.get(query);
  if (cached) {
    return cached;
  }
  const document = parse(query);
  queryCache.set(query, document);
  return document;
};

const sendGraphqlError = (
  error: GraphQLError,
  req: FastifyRequest,
  res: FastifyReply,
): FastifyReply => {
  const code = error.extensions?.code;

  // Anonymous writes are refused like any other write without permission
  if (code === 'UNAUTHENTICATED') {
    return res.status(403).send({
      error: 'forbidden',
      message: 'Authentication credentials were not provided',
    });
  }
  if (code === 'FORBIDDEN') {
    return res.status(403).send({
      error: 'forbidden',
      message: error.message || 'Access denied',
    });
  }
  if (
    code === 'NOT_FOUND' ||
    error.originalError instanceof EntityNotFoundError
  ) {
    return res.status(404).send({
      error: 'not_found',
      message: error.message || 'Resource not found',
    });
  }
  // Errors without an original error come from coercing the variables
  if (code === 'GRAPHQL_VALIDATION_FAILED' || !error.originalError) {
    return res.status(400).send({
      error: 'validation_error',
      message: error.message || 'Invalid request',
      fields: error.extensions?.fields ?? {},
    });
  }

  req.log.warn(
    { err: error.originalError },
    'unexpected graphql error when executing graphql request',
  );
  return res.status(500).send({
    error: 'internal_error',
    message: 'Unexpected error',
  });
};

/**
 * Executes an operation against the GraphQL schema in-process, so the REST
 * routes share the resolvers, permissions and validation of the GraphQL API.
 */
export const executeGraphql = async <T>(
  con: DataSource,
  payload: GraphqlPayload,
  extractResponse: (obj: Record<string, unknown>) => T | Promise<T>,
  req: FastifyRequest,
  res: FastifyReply,
  { statusCode = 200 }: ExecuteGraphqlOptions = {},
): Promise<FastifyReply> => {
  const context = new Context(req, con);

  const result = await execute({
    schema,
    document: parseQuery(payload.query),
    contextValue: context,
    variableValues: payload.variables,
  });

  if (result.errors?.length) {
    return sendGraphqlError(result.errors[0], req, res);
  }

  const resBody = await extractResponse(result.data ?? {});
  if (res.sent) {
    return res;
  }
  if (resBody === undefined || resBody === null) {
    return res.status(204).send();
  }
  return res.status(statusCode).send(resBody);
};
