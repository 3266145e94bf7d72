import { ApolloError } from 'apollo-server-errors';
import { QueryFailedError } from 'typeorm';
import type { ZodError } from 'zod';

export type ValidationErrorFields = Record<string, string[]>;

export class NotFoundError extends ApolloError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');

    Object.defineProperty(this, 'name', { value: 'NotFoundError' });
  }
}

// Return 400 HTTP status code
export class ValidationError extends ApolloError {
  fields: ValidationErrorFields;

  constructor(message: string, fields: ValidationErrorFields = {}) {
    super(message, 'GRAPHQL_VALIDATION_FAILED', { fields });

    this.fields = fields;
    Object.defineProperty(this, 'name', { value: 'ValidationError' });
  }
}

export const toValidationError = (err: ZodError): ValidationError => {
  const fields: ValidationErrorFields = {};
  for (const issue of err.issues) {
    const field = issue.path.length ? issue.path.join('.') : '_';
    fields[field] = [...(fields[field] ?? []), issue.message];
  }
  const [first] = Object.keys(fields);
  return new ValidationError(
    first ? `Invalid value for field "${first}"` : 'Invalid input',
    fields,
  );
};

export enum TypeOrmError {
  FOREIGN_KEY = '23503',
}

export type TypeORMQueryFailedError = QueryFailedError & {
  code?: string;
  constraint?: string;
  detail?: string;
};
