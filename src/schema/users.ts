import { Connection, ConnectionArguments } from 'graphql-relay';
import { Context } from '../Context';
import { USERS_MAX_PAGE_SIZE, USERS_PAGE_SIZE } from '../config';
import { Snippet, User } from '../entity';
import { NotFoundError } from '../errors';
import { connectionFromNodes, offsetPageGenerator } from './common';
import { snippetsConnection } from './snippets';

export const typeDefs = /* GraphQL */ `
  type User {
    id: ID!
    username: String!
    name: String
    createdAt: DateTime!
    """
    Snippets owned by the user, oldest first
    """
    snippets(first: Int, after: String): SnippetConnection!
    """
    Ids of every snippet owned by the user, oldest first
    """
    snippetIds: [Int!]!
  }

  type UserEdge {
    node: User!
    cursor: String!
  }

  type UserConnection {
    pageInfo: PageInfo!
    edges: [UserEdge!]!
  }

  extend type Query {
    users(first: Int, after: String): UserConnection!

    user(id: ID!): User!
  }
`;

const usersPageGenerator = offsetPageGenerator<User>(
  USERS_PAGE_SIZE,
  USERS_MAX_PAGE_SIZE,
);

export const resolvers = {
  Query: {
    users: async (
      _: unknown,
      args: ConnectionArguments,
      ctx: Context,
    ): Promise<Connection<User>> => {
      const page = usersPageGenerator.connArgsToPage(args);
      const nodes = await ctx.getRepository(User).find({
        order: { createdAt: 'ASC', id: 'ASC' },
        take: page.limit,
        skip: page.offset,
      });
      return connectionFromNodes(args, nodes, page, usersPageGenerator);
    },
    user: async (
      _: unknown,
      { id }: { id: string },
      ctx: Context,
    ): Promise<User> => {
      const user = await ctx.getRepository(User).findOneBy({ id });
      if (!user) {
        throw new NotFoundError('User not found');
      }
      return user;
    },
  },
  User: {
    snippets: (
      user: User,
      args: ConnectionArguments,
      ctx: Context,
    ): Promise<Connection<Snippet>> => snippetsConnection(ctx, args, user.id),
    snippetIds: async (
      user: User,
      _: unknown,
      ctx: Context,
    ): Promise<number[]> => {
      const snippets = await ctx.getRepository(Snippet).find({
        select: ['id'],
        where: { ownerId: user.id },
        order: { created: 'ASC', id: 'ASC' },
      });
      return snippets.map(({ id }) => id);
    },
  },
};
