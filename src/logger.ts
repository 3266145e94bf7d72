import { env } from 'node:process';

import { createGcpLoggingPinoConfig } from '@google-cloud/pino-logging-gcp-config';
import type { LoggerOptions } from 'pino';
import { isProd, serviceContext } from './config';

const pinoLoggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL || (env.NODE_ENV === 'test' ? 'silent' : 'info'),
};

export const loggerConfig: LoggerOptions = isProd
  ? createGcpLoggingPinoConfig({ serviceContext }, pinoLoggerOptions)
  : pinoLoggerOptions;
