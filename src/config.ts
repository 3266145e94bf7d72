import dotenv from 'dotenv';

const env = process.env.NODE_ENV || 'development';

dotenv.config({ path: `.env.${env}` });
dotenv.config({ path: '.env' });

export const isProd = env === 'production';

export const DEFAULT_PORT = 3000;

export const SNIPPETS_PAGE_SIZE = 10;
export const SNIPPETS_MAX_PAGE_SIZE = 100;

export const USERS_PAGE_SIZE = 10;
export const USERS_MAX_PAGE_SIZE = 100;

export const SNIPPET_TITLE_MAX_LENGTH = 100;

export const DEFAULT_SNIPPET_LANGUAGE = 'python';
export const DEFAULT_SNIPPET_STYLE = 'friendly';

export const jwtConfig = {
  secret: process.env.JWT_SECRET || '',
  audience: process.env.JWT_AUDIENCE || 'snippets-api',
  issuer: process.env.JWT_ISSUER || 'snippets-api',
};

export const serviceContext = {
  service: process.env.SERVICE_NAME || 'snippets-api',
  version: process.env.SERVICE_VERSION || 'latest',
};
