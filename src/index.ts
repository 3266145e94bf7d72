import 'reflect-metadata';
import fastify, { FastifyInstance, FastifyRequest } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import mercurius from 'mercurius';
import { GraphQLError, NoSchemaIntrospectionCustomRule } from 'graphql';
import { EntityNotFoundError } from 'typeorm';
import { ZodError } from 'zod';

import { isProd } from './config';

import auth from './auth';
import routes from './routes';
import { Context } from './Context';
import { schema } from './graphql';
import createOrGetConnection from './db';
import { stringifyHealthCheck } from './common';
import { loggerConfig } from './logger';
import { toValidationError } from './errors';

type Mutable<Type> = {
  -readonly [Key in keyof Type]: Type[Key];
};

// readiness probe is set failureThreshold: 2, periodSeconds: 2 (4s) + small delay
const GRACEFUL_DELAY = 2 * 2 * 1000 + 5000;

export default async function app(
  contextFn?: (request: FastifyRequest) => Context,
): Promise<FastifyInstance> {
  let isTerminating = false;
  const connection = await createOrGetConnection();

  const app = fastify({
    logger: loggerConfig,
    disableRequestLogging: true,
    trustProxy: true,
  });

  const gracefulShutdown = () => {
    app.log.info('starting termination');
    isTerminating = true;
    setTimeout(async () => {
      await app.close();
      await connection.destroy();
      process.exit();
    }, GRACEFUL_DELAY);
  };
  if (process.env.NODE_ENV !== 'test') {
    process.on('SIGINT', gracefulShutdown);
    process.on('SIGTERM', gracefulShutdown);
  }

  app.register(helmet);
  app.register(cors, {
    origin: process.env.ORIGIN ? process.env.ORIGIN.split(',') : true,
    credentials: true,
    cacheControl: 86400,
    maxAge: 86400,
  });
  app.register(auth, { secret: process.env.ACCESS_SECRET });

  app.setErrorHandler((err, req, res) => {
    if (err.validation) {
      return res.code(400).send({
        error: 'validation_error',
        message: err.message,
      });
    }
    req.log.error({ err }, err.message);
    return res
      .code(500)
      .send({ statusCode: 500, error: 'Internal Server Error' });
  });

  app.get('/health', (req, res) => {
    res.type('application/health+json');
    if (isTerminating) {
      res.status(500).send(stringifyHealthCheck({ status: 'terminating' }));
    } else {
      res.send(stringifyHealthCheck({ status: 'ok' }));
    }
  });

  app.get('/liveness', (req, res) => {
    res.type('application/health+json');
    res.send(stringifyHealthCheck({ status: 'ok' }));
  });

  app.register(mercurius, {
    schema,
    context:
      contextFn ?? ((request): Context => new Context(request, connection)),
    queryDepth: 10,
    // Disable GraphQL introspection in production
    graphiql: !isProd,
    validationRules: isProd ? [NoSchemaIntrospectionCustomRule] : undefined,
    errorFormatter(execution, ctx) {
      if (!execution.errors?.length) {
        return {
          statusCode: 200,
          response: execution,
        };
      }
      return {
        statusCode: 200,
        response: {
          data: execution.data,
          errors: execution.errors.map((error): GraphQLError => {
            const newError = error as Mutable<GraphQLError>;
            const { originalError } = error;
            if (!originalError) {
              newError.extensions = {
                code: 'GRAPHQL_VALIDATION_FAILED',
              };
            } else if (originalError instanceof EntityNotFoundError) {
              newError.message = 'Entity not found';
              newError.extensions = {
                code: 'NOT_FOUND',
              };
            } else if (originalError instanceof ZodError) {
              const validationError = toValidationError(originalError);
              newError.message = validationError.message;
              newError.extensions = validationError.extensions;
            } else if (!error.extensions?.code) {
              app.log.warn(
                {
                  err: originalError,
                  body: ctx?.reply?.request?.body,
                },
                'unexpected graphql error',
              );
              newError.message = 'Unexpected error';
              newError.extensions = {
                code: 'UNEXPECTED',
              };
            }
            if (isProd) {
              newError.originalError = undefined;
            }
            return newError;
          }),
        },
      };
    },
  });

  app.register(routes, { prefix: '/', con: connection });

  return app;
}
