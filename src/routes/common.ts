/**
 * Shared constants, field strings and response mappers for the REST routes.
 */
import { SNIPPETS_MAX_PAGE_SIZE, SNIPPETS_PAGE_SIZE } from '../config';

export const parseLimit = (
  limit?: number | string,
  defaultLimit = SNIPPETS_PAGE_SIZE,
  maxLimit = SNIPPETS_MAX_PAGE_SIZE,
): number => {
  const parsed = typeof limit === 'string' ? parseInt(limit, 10) : limit;
  if (!parsed || Number.isNaN(parsed) || parsed < 1) {
    return defaultLimit;
  }
  return Math.min(parsed, maxLimit);
};

export const SNIPPET_FIELDS = `
  id
  created
  title
  code
  linenos
  language
  style
  owner {
    username
  }
`;

export const USER_FIELDS = `
  id
  username
  name
  snippetIds
`;

export const PAGE_INFO_FIELDS = `
  pageInfo {
    hasNextPage
    endCursor
  }
`;

export interface SnippetNode {
  id: string;
  // DateTime scalars stay Date objects until the response is serialized
  created: Date | string;
  title: string;
  code: string;
  linenos: boolean;
  language: string;
  style: string;
  owner: { username: string };
}

export interface UserNode {
  id: string;
  username: string;
  name: string | null;
  snippetIds: number[];
}

export interface Connection<T> {
  edges: { node: T }[];
  pageInfo: {
    hasNextPage: boolean;
    endCursor: string | null;
  };
}

export interface Pagination {
  hasNextPage: boolean;
  cursor: string | null;
}

export interface SnippetResponse {
  id: number;
  created: string;
  title: string;
  code: string;
  linenos: boolean;
  language: string;
  style: string;
  owner: string;
  highlight: string;
}

export interface UserResponse {
  id: string;
  username: string;
  name: string | null;
  snippets: number[];
}

export const toSnippetResponse = (node: SnippetNode): SnippetResponse => ({
  id: parseInt(node.id, 10),
  created: new Date(node.created).toISOString(),
  title: node.title,
  code: node.code,
  linenos: node.linenos,
  language: node.language,
  style: node.style,
  owner: node.owner.username,
  highlight: `/snippets/${node.id}/highlight`,
});

export const toUserResponse = (node: UserNode): UserResponse => ({
  id: node.id,
  username: node.username,
  name: node.name,
  snippets: node.snippetIds,
});

export const toPagination = <T>(connection: Connection<T>): Pagination => ({
  hasNextPage: connection.pageInfo.hasNextPage,
  cursor: connection.pageInfo.endCursor,
});
