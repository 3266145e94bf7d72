import {
  Connection,
  ConnectionArguments,
  Edge,
  getOffsetWithDefault,
  offsetToCursor,
} from 'graphql-relay';
import { GraphQLDateTime } from 'graphql-scalars';

export interface GQLEmptyResponse {
  _: boolean;
}

export const typeDefs = /* GraphQL */ `
  """
  The javascript \`Date\` as string. Type represents date and time as the ISO Date string.
  """
  scalar DateTime

  type Query

  type Mutation

  type PageInfo {
    hasNextPage: Boolean!
    hasPreviousPage: Boolean!
    startCursor: String
    endCursor: String
  }

  """
  Used for mutations with empty response
  """
  type EmptyResponse {
    """
    Every type must have at least one field
    """
    _: Boolean
  }
`;

export const resolvers = {
  DateTime: GraphQLDateTime,
};

export interface Page {
  limit: number;
}

export interface OffsetPage extends Page {
  offset: number;
}

export interface PageGenerator<
  TReturn,
  TArgs extends ConnectionArguments,
  TPage extends Page,
> {
  connArgsToPage: (args: TArgs) => TPage;
  nodeToCursor: (
    page: TPage,
    args: TArgs,
    node: TReturn,
    index: number,
  ) => string;
  hasNextPage: (page: TPage, nodesSize: number) => boolean;
  hasPreviousPage: (page: TPage, nodesSize: number) => boolean;
}

export const offsetPageGenerator = <TReturn>(
  defaultLimit: number,
  maxLimit: number,
): PageGenerator<TReturn, ConnectionArguments, OffsetPage> => ({
  connArgsToPage: (args: ConnectionArguments): OffsetPage => {
    const limit = Math.min(Math.max(args.first || defaultLimit, 1), maxLimit);
    const offset = getOffsetWithDefault(args.after, -1) + 1;
    return { limit, offset };
  },
  nodeToCursor: (page, args, node, i): string =>
    offsetToCursor(page.offset + i),
  hasNextPage: (page, nodesSize): boolean => page.limit === nodesSize,
  hasPreviousPage: (page): boolean => page.offset > 0,
});

export function connectionFromNodes<
  TReturn,
  TArgs extends ConnectionArguments,
  TPage extends Page,
>(
  args: TArgs,
  nodes: TReturn[],
  page: TPage,
  pageGenerator: PageGenerator<TReturn, TArgs, TPage>,
): Connection<TReturn> {
  if (!nodes.length) {
    return {
      pageInfo: {
        startCursor: null,
        endCursor: null,
        hasNextPage: false,
        hasPreviousPage: pageGenerator.hasPreviousPage(page, 0),
      },
      edges: [],
    };
  }

  const edges = nodes.map(
    (n, i): Edge<TReturn> => ({
      node: n,
      cursor: pageGenerator.nodeToCursor(page, args, n, i),
    }),
  );
  return {
    pageInfo: {
      startCursor: edges[0].cursor,
      endCursor: edges[edges.length - 1].cursor,
      hasNextPage: pageGenerator.hasNextPage(page, nodes.length),
      hasPreviousPage: pageGenerator.hasPreviousPage(page, nodes.length),
    },
    edges,
  };
}
