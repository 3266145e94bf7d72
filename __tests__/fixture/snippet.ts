import type { CreateSnippetInput } from '../../src/common/schema/snippets';

export const snippetsFixture: (CreateSnippetInput & { ownerId: string })[] = [
  {
    ownerId: '1',
    title: 'Hello',
    code: 'print("hello")',
  },
  {
    ownerId: '1',
    title: 'Sum',
    code: 'const sum = (a, b) => a + b;',
    language: 'javascript',
    style: 'monokai',
  },
  {
    ownerId: '2',
    code: 'SELECT 1;',
    language: 'sql',
    linenos: true,
  },
];
