import type { FastifyInstance } from 'fastify';
import type { DataSource } from 'typeorm';
import { executeGraphql } from './graphqlExecutor';
import {
  Connection,
  PAGE_INFO_FIELDS,
  parseLimit,
  SNIPPET_FIELDS,
  SnippetNode,
  toPagination,
  toSnippetResponse,
} from './common';

const SNIPPETS_QUERY = `
  query RestSnippets($first: Int, $after: String) {
    snippets(first: $first, after: $after) {
      edges {
        node {
          ${SNIPPET_FIELDS}
        }
      }
      ${PAGE_INFO_FIELDS}
    }
  }
`;

const SNIPPET_QUERY = `
  query RestSnippet($id: ID!) {
    snippet(id: $id) {
      ${SNIPPET_FIELDS}
    }
  }
`;

const SNIPPET_HIGHLIGHT_QUERY = `
  query RestSnippetHighlight($id: ID!) {
    snippet(id: $id) {
      highlighted
    }
  }
`;

const CREATE_SNIPPET_MUTATION = `
  mutation RestCreateSnippet($input: CreateSnippetInput!) {
    createSnippet(input: $input) {
      ${SNIPPET_FIELDS}
    }
  }
`;

const UPDATE_SNIPPET_MUTATION = `
  mutation RestUpdateSnippet($id: ID!, $input: UpdateSnippetInput!) {
    updateSnippet(id: $id, input: $input) {
      ${SNIPPET_FIELDS}
    }
  }
`;

const DELETE_SNIPPET_MUTATION = `
  mutation RestDeleteSnippet($id: ID!) {
    deleteSnippet(id: $id) {
      _
    }
  }
`;

interface SnippetsResponse {
  snippets: Connection<SnippetNode>;
}

interface SnippetResponse {
  snippet: SnippetNode;
}

interface SnippetHighlightResponse {
  snippet: { highlighted: string };
}

interface CreateSnippetResponse {
  createSnippet: SnippetNode;
}

interface UpdateSnippetResponse {
  updateSnippet: SnippetNode;
}

interface SnippetBody {
  code?: string;
  title?: string;
  linenos?: boolean;
  language?: string;
  style?: string;
}

type SnippetParams = { id: string };

const snippetBody = (required: string[]) => ({
  schema: {
    body: {
      type: 'object',
      required,
      additionalProperties: false,
      properties: {
        code: { type: 'string' },
        title: { type: 'string' },
        linenos: { type: 'boolean' },
        language: { type: 'string' },
        style: { type: 'string' },
      },
    },
  },
});

export default async function (
  fastify: FastifyInstance,
  { con }: { con: DataSource },
): Promise<void> {
  fastify.get<{ Querystring: { limit?: string; cursor?: string } }>(
    '/',
    async (request, reply) =>
      executeGraphql(
        con,
        {
          query: SNIPPETS_QUERY,
          variables: {
            first: parseLimit(request.query.limit),
            after: request.query.cursor ?? null,
          },
        },
        (json) => {
          const { snippets } = json as unknown as SnippetsResponse;
          return {
            data: snippets.edges.map(({ node }) => toSnippetResponse(node)),
            pagination: toPagination(snippets),
          };
        },
        request,
        reply,
      ),
  );

  fastify.post<{ Body: SnippetBody }>(
    '/',
    snippetBody(['code']),
    async (request, reply) =>
      executeGraphql(
        con,
        {
          query: CREATE_SNIPPET_MUTATION,
          variables: { input: request.body },
        },
        (json) =>
          toSnippetResponse(
            (json as unknown as CreateSnippetResponse).createSnippet,
          ),
        request,
        reply,
        { statusCode: 201 },
      ),
  );

  fastify.get<{ Params: SnippetParams }>('/:id', async (request, reply) =>
    executeGraphql(
      con,
      {
        query: SNIPPET_QUERY,
        variables: { id: request.params.id },
      },
      (json) =>
        toSnippetResponse((json as unknown as SnippetResponse).snippet),
      request,
      reply,
    ),
  );

  fastify.get<{ Params: SnippetParams }>(
    '/:id/highlight',
    async (request, reply) =>
      executeGraphql(
        con,
        {
          query: SNIPPET_HIGHLIGHT_QUERY,
          variables: { id: request.params.id },
        },
        (json) => {
          reply.type('text/html; charset=utf-8');
          return (json as unknown as SnippetHighlightResponse).snippet
            .highlighted;
        },
        request,
        reply,
      ),
  );

  // PUT replaces the editable fields, the code is therefore mandatory
  fastify.put<{ Params: SnippetParams; Body: SnippetBody }>(
    '/:id',
    snippetBody(['code']),
    async (request, reply) =>
      executeGraphql(
        con,
        {
          query: UPDATE_SNIPPET_MUTATION,
          variables: { id: request.params.id, input: request.body },
        },
        (json) =>
          toSnippetResponse(
            (json as unknown as UpdateSnippetResponse).updateSnippet,
          ),
        request,
        reply,
      ),
  );

  fastify.patch<{ Params: SnippetParams; Body: SnippetBody }>(
    '/:id',
    snippetBody([]),
    async (request, reply) =>
      executeGraphql(
        con,
        {
          query: UPDATE_SNIPPET_MUTATION,
          variables: { id: request.params.id, input: request.body ?? {} },
        },
        (json) =>
          toSnippetResponse(
            (json as unknown as UpdateSnippetResponse).updateSnippet,
          ),
        request,
        reply,
      ),
  );

  fastify.delete<{ Params: SnippetParams }>('/:id', async (request, reply) =>
    executeGraphql(
      con,
      {
        query: DELETE_SNIPPET_MUTATION,
        variables: { id: request.params.id },
      },
      () => undefined,
      request,
      reply,
    ),
  );
}
