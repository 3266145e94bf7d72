import { ForbiddenError } from 'apollo-server-errors';
import { Connection, ConnectionArguments } from 'graphql-relay';
import { AuthContext, BaseContext, Context } from '../Context';
import { SNIPPETS_MAX_PAGE_SIZE, SNIPPETS_PAGE_SIZE } from '../config';
import { Snippet, User } from '../entity';
import {
  createSnippet,
  deleteSnippet,
  getSnippet,
  hasSnippetPermission,
  LANGUAGE_CHOICES,
  listSnippets,
  parseSnippetId,
  SnippetPermissions,
  STYLE_CHOICES,
  updateSnippet,
} from '../common';
import type {
  CreateSnippetInput,
  UpdateSnippetInput,
} from '../common/schema/snippets';
import {
  connectionFromNodes,
  GQLEmptyResponse,
  offsetPageGenerator,
} from './common';

export const typeDefs = /* GraphQL */ `
  type Snippet {
    id: ID!
    created: DateTime!
    title: String!
    code: String!
    linenos: Boolean!
    language: String!
    style: String!
    """
    Standalone HTML document of the highlighted code
    """
    highlighted: String!
    owner: User!
  }

  type SnippetEdge {
    node: Snippet!
    cursor: String!
  }

  type SnippetConnection {
    pageInfo: PageInfo!
    edges: [SnippetEdge!]!
  }

  input CreateSnippetInput {
    code: String!
    title: String
    linenos: Boolean
    language: String
    style: String
  }

  input UpdateSnippetInput {
    code: String
    title: String
    linenos: Boolean
    language: String
    style: String
  }

  extend type Query {
    """
    All snippets, oldest first
    """
    snippets(first: Int, after: String): SnippetConnection!

    snippet(id: ID!): Snippet!

    """
    Languages a snippet can be highlighted as. Inputs also take their
    aliases, such as py or js, and store the name listed here
    """
    snippetLanguages: [String!]!

    """
    Color themes a snippet can be rendered with
    """
    snippetStyles: [String!]!
  }

  extend type Mutation {
    createSnippet(input: CreateSnippetInput!): Snippet! @auth

    """
    Update a snippet, only its owner is allowed to
    """
    updateSnippet(id: ID!, input: UpdateSnippetInput!): Snippet! @auth

    """
    Delete a snippet, only its owner is allowed to
    """
    deleteSnippet(id: ID!): EmptyResponse! @auth
  }
`;

export const ensureSnippetPermissions = async (
  ctx: BaseContext & { userId?: string },
  id: string | number,
  permission: SnippetPermissions,
): Promise<Snippet> => {
  const snippet = await getSnippet(ctx.con, parseSnippetId(id));
  if (!hasSnippetPermission(ctx.userId, snippet, permission)) {
    throw new ForbiddenError(
      'Access denied! Only the owner of the snippet can perform this action',
    );
  }
  return snippet;
};

const snippetsPageGenerator = offsetPageGenerator<Snippet>(
  SNIPPETS_PAGE_SIZE,
  SNIPPETS_MAX_PAGE_SIZE,
);

export const snippetsConnection = async (
  ctx: BaseContext,
  args: ConnectionArguments,
  ownerId?: string,
): Promise<Connection<Snippet>> => {
  const page = snippetsPageGenerator.connArgsToPage(args);
  const nodes = await listSnippets(ctx.con, {
    limit: page.limit,
    offset: page.offset,
    ownerId,
  });
  return connectionFromNodes(args, nodes, page, snippetsPageGenerator);
};

export const resolvers = {
  Query: {
    snippets: (
      _: unknown,
      args: ConnectionArguments,
      ctx: Context,
    ): Promise<Connection<Snippet>> => snippetsConnection(ctx, args),
    snippet: (
      _: unknown,
      { id }: { id: string },
      ctx: Context,
    ): Promise<Snippet> =>
      ensureSnippetPermissions(ctx, id, SnippetPermissions.View),
    snippetLanguages: (): readonly string[] => LANGUAGE_CHOICES,
    snippetStyles: (): readonly string[] => STYLE_CHOICES,
  },
  Mutation: {
    createSnippet: async (
      _: unknown,
      { input }: { input: CreateSnippetInput },
      ctx: AuthContext,
    ): Promise<Snippet> => {
      const snippet = await createSnippet(ctx.con, input, ctx.userId);
      ctx.log.info(
        { snippetId: snippet.id, userId: ctx.userId },
        'snippet created',
      );
      return snippet;
    },
    updateSnippet: async (
      _: unknown,
      { id, input }: { id: string; input: UpdateSnippetInput },
      ctx: AuthContext,
    ): Promise<Snippet> => {
      const snippet = await ensureSnippetPermissions(
        ctx,
        id,
        SnippetPermissions.Edit,
      );
      return updateSnippet(ctx.con, snippet.id, input);
    },
    deleteSnippet: async (
      _: unknown,
      { id }: { id: string },
      ctx: AuthContext,
    ): Promise<GQLEmptyResponse> => {
      const snippet = await ensureSnippetPermissions(
        ctx,
        id,
        SnippetPermissions.Delete,
      );
      await deleteSnippet(ctx.con, snippet.id);
      ctx.log.info(
        { snippetId: snippet.id, userId: ctx.userId },
        'snippet deleted',
      );
      return { _: true };
    },
  },
  Snippet: {
    owner: (snippet: Snippet, _: unknown, ctx: Context): Promise<User> =>
      ctx.getRepository(User).findOneByOrFail({ id: snippet.ownerId }),
  },
};
