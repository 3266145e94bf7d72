import { DataSource, FindOptionsWhere } from 'typeorm';
import { ZodType, ZodTypeDef } from 'zod';
import { Snippet, User } from '../entity';
import {
  NotFoundError,
  toValidationError,
  TypeOrmError,
  TypeORMQueryFailedError,
  ValidationError,
} from '../errors';
import { renderSnippet } from './highlight';
import {
  createSnippetSchema,
  CreateSnippetInput,
  snippetIdSchema,
  updateSnippetSchema,
  UpdateSnippetInput,
} from './schema/snippets';

const parseInput = <Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: Input,
): Output => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
};

/**
 * Ids arrive as strings from the API, anything that is not a valid
 * primary key cannot match a snippet.
 */
export const parseSnippetId = (id: string | number): number => {
  const result = snippetIdSchema.safeParse(id);
  if (!result.success) {
    throw new NotFoundError('Snippet not found');
  }
  return result.data;
};

export const getSnippet = async (
  con: DataSource,
  id: number,
): Promise<Snippet> => {
  const snippet = await con.getRepository(Snippet).findOneBy({ id });
  if (!snippet) {
    throw new NotFoundError('Snippet not found');
  }
  return snippet;
};

export interface ListSnippetsOptions {
  limit: number;
  offset?: number;
  ownerId?: string;
}

export const listSnippets = (
  con: DataSource,
  { limit, offset = 0, ownerId }: ListSnippetsOptions,
): Promise<Snippet[]> => {
  const where: FindOptionsWhere<Snippet> = ownerId ? { ownerId } : {};
  return con.getRepository(Snippet).find({
    where,
    order: { created: 'ASC', id: 'ASC' },
    take: limit,
    skip: offset,
  });
};

export const createSnippet = async (
  con: DataSource,
  input: CreateSnippetInput,
  ownerId: string | undefined,
): Promise<Snippet> => {
  const data = parseInput(createSnippetSchema, input);
  if (!ownerId) {
    throw new ValidationError('Snippet owner is required', {
      owner: ['Required'],
    });
  }

  return con.transaction(async (entityManager) => {
    const owner = await entityManager
      .getRepository(User)
      .findOneBy({ id: ownerId });
    if (!owner) {
      throw new ValidationError('Snippet owner does not exist', {
        owner: [`User "${ownerId}" does not exist`],
      });
    }

    const repo = entityManager.getRepository(Snippet);
    const snippet = repo.create({
      ...data,
      ownerId,
      highlighted: renderSnippet(data),
    });
    try {
      return await repo.save(snippet);
    } catch (originalError) {
      const err = originalError as TypeORMQueryFailedError;
      // Owner removed while the snippet was being written
      if (err?.code === TypeOrmError.FOREIGN_KEY) {
        throw new ValidationError('Snippet owner does not exist', {
          owner: [`User "${ownerId}" does not exist`],
        });
      }
      throw err;
    }
  });
};

export const updateSnippet = async (
  con: DataSource,
  id: number,
  fields: UpdateSnippetInput,
): Promise<Snippet> => {
  const data = parseInput(updateSnippetSchema, fields);

  return con.transaction(async (entityManager) => {
    const repo = entityManager.getRepository(Snippet);
    const snippet = await repo.findOneBy({ id });
    if (!snippet) {
      throw new NotFoundError('Snippet not found');
    }

    snippet.code = data.code ?? snippet.code;
    snippet.title = data.title ?? snippet.title;
    snippet.linenos = data.linenos ?? snippet.linenos;
    snippet.language = data.language ?? snippet.language;
    snippet.style = data.style ?? snippet.style;
    snippet.highlighted = renderSnippet(snippet);

    return repo.save(snippet);
  });
};

export const deleteSnippet = async (
  con: DataSource,
  id: number,
): Promise<void> => {
  const { affected } = await con.getRepository(Snippet).delete({ id });
  if (!affected) {
    throw new NotFoundError('Snippet not found');
  }
};
