import { DataSource } from 'typeorm';
import createOrGetConnection from '../../src/db';
import {
  createSnippet,
  deleteSnippet,
  getSnippet,
  listSnippets,
  parseSnippetId,
  renderSnippet,
  updateSnippet,
} from '../../src/common';
import { Snippet, User } from '../../src/entity';
import { NotFoundError, ValidationError } from '../../src/errors';
import { saveFixtures, saveSnippetFixtures } from '../helpers';
import { usersFixture } from '../fixture/user';

let con: DataSource;

beforeAll(async () => {
  con = await createOrGetConnection();
});

beforeEach(async () => {
  await saveFixtures(con, User, usersFixture);
});

const countSnippets = (): Promise<number> => con.getRepository(Snippet).count();

describe('createSnippet', () => {
  it('should fill in the defaults and render the code', async () => {
    const snippet = await createSnippet(con, { code: 'print(1)' }, '1');

    expect(snippet).toMatchObject({
      id: 1,
      title: '',
      code: 'print(1)',
      linenos: false,
      language: 'python',
      style: 'friendly',
      ownerId: '1',
    });
    expect(snippet.created).toBeInstanceOf(Date);
    expect(snippet.highlighted).toEqual(
      renderSnippet({
        code: 'print(1)',
        title: '',
        linenos: false,
        language: 'python',
        style: 'friendly',
      }),
    );

    const saved = await getSnippet(con, snippet.id);
    expect(saved.highlighted).toEqual(snippet.highlighted);
    expect(saved.linenos).toBe(false);
  });

  it('should keep the given fields', async () => {
    const snippet = await createSnippet(
      con,
      {
        code: 'SELECT 1;',
        title: 'Query',
        linenos: true,
        language: 'sql',
        style: 'monokai',
      },
      '2',
    );

    const saved = await getSnippet(con, snippet.id);
    expect(saved).toMatchObject({
      title: 'Query',
      code: 'SELECT 1;',
      linenos: true,
      language: 'sql',
      style: 'monokai',
      ownerId: '2',
    });
    expect(saved.highlighted).toContain('<h2>Query</h2>');
    expect(saved.highlighted).toContain('<td class="linenos">');
    expect(saved.highlighted).toContain(
      '.highlight { background: #272822; color: #f8f8f2; }',
    );
  });

  it('should reject empty code', async () => {
    await expect(createSnippet(con, { code: '' }, '1')).rejects.toMatchObject({
      message: 'Invalid value for field "code"',
      fields: { code: ['Code must not be empty'] },
    });
    expect(await countSnippets()).toEqual(0);
  });

  it('should reject an unknown language', async () => {
    await expect(
      createSnippet(con, { code: 'x', language: 'klingon' }, '1'),
    ).rejects.toMatchObject({
      message: 'Invalid value for field "language"',
      fields: { language: ['"klingon" is not a valid choice'] },
    });
    expect(await countSnippets()).toEqual(0);
  });

  it('should store the grammar name for a language alias', async () => {
    const snippet = await createSnippet(
      con,
      { code: 'print(1)', language: 'py' },
      '1',
    );
    expect(snippet.language).toEqual('python');
    expect(snippet.highlighted).toContain('class="hljs language-python"');

    const updated = await updateSnippet(con, snippet.id, { language: 'js' });
    expect(updated.language).toEqual('javascript');
    expect((await getSnippet(con, snippet.id)).language).toEqual('javascript');
  });

  it('should reject an unknown style', async () => {
    await expect(
      createSnippet(con, { code: 'x', style: 'neon' }, '1'),
    ).rejects.toMatchObject({
      fields: { style: ['"neon" is not a valid choice'] },
    });
  });

  it('should reject a title longer than 100 characters', async () => {
    await expect(
      createSnippet(con, { code: 'x', title: 'a'.repeat(101) }, '1'),
    ).rejects.toMatchObject({
      fields: { title: ['String must contain at most 100 character(s)'] },
    });
    expect(await countSnippets()).toEqual(0);
  });

  it('should accept a title of exactly 100 characters', async () => {
    const snippet = await createSnippet(
      con,
      { code: 'x', title: 'a'.repeat(100) },
      '1',
    );
    expect(snippet.title).toHaveLength(100);
  });

  it('should require an owner', async () => {
    await expect(
      createSnippet(con, { code: 'x' }, undefined),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      createSnippet(con, { code: 'x' }, undefined),
    ).rejects.toMatchObject({
      message: 'Snippet owner is required',
      fields: { owner: ['Required'] },
    });
  });

  it('should require an existing owner', async () => {
    await expect(
      createSnippet(con, { code: 'x' }, '42'),
    ).rejects.toMatchObject({
      message: 'Snippet owner does not exist',
      fields: { owner: ['User "42" does not exist'] },
    });
    expect(await countSnippets()).toEqual(0);
  });
});

describe('updateSnippet', () => {
  it('should change only the given fields and render again', async () => {
    const [snippet] = await saveSnippetFixtures(con);
    const updated = await updateSnippet(con, snippet.id, {
      style: 'monokai',
      linenos: true,
    });

    expect(updated).toMatchObject({
      id: snippet.id,
      title: 'Hello',
      code: 'print("hello")',
      language: 'python',
      style: 'monokai',
      linenos: true,
      ownerId: '1',
    });
    expect(updated.highlighted).toEqual(
      renderSnippet({
        code: 'print("hello")',
        title: 'Hello',
        language: 'python',
        style: 'monokai',
        linenos: true,
      }),
    );
    const saved = await getSnippet(con, snippet.id);
    expect(saved.highlighted).toEqual(updated.highlighted);
    expect(saved.linenos).toBe(true);
  });

  it('should render the new code', async () => {
    const snippet = await createSnippet(con, { code: 'print(1)' }, '1');
    const updated = await updateSnippet(con, snippet.id, { code: 'print(2)' });

    const text = updated.highlighted.replace(/<[^>]+>/g, '');
    expect(text).toContain('print(2)');
    expect(text).not.toContain('print(1)');
  });

  it('should render the same document when nothing changes', async () => {
    const [snippet] = await saveSnippetFixtures(con);
    const updated = await updateSnippet(con, snippet.id, {
      title: snippet.title,
    });
    expect(updated.highlighted).toEqual(snippet.highlighted);
  });

  it('should ignore the owner and other unknown fields', async () => {
    const [snippet] = await saveSnippetFixtures(con);
    const fields = { code: 'print(2)', ownerId: '2', highlighted: 'nope' };
    const updated = await updateSnippet(con, snippet.id, fields);

    expect(updated.ownerId).toEqual('1');
    expect(updated.code).toEqual('print(2)');
    expect(updated.highlighted).toStartWith('<!DOCTYPE html>');
  });

  it('should leave the record untouched on invalid input', async () => {
    const [snippet] = await saveSnippetFixtures(con);
    await expect(
      updateSnippet(con, snippet.id, { code: 'x', language: 'klingon' }),
    ).rejects.toMatchObject({
      fields: { language: ['"klingon" is not a valid choice'] },
    });

    const saved = await getSnippet(con, snippet.id);
    expect(saved.code).toEqual('print("hello")');
    expect(saved.highlighted).toEqual(snippet.highlighted);
  });

  it('should throw when the snippet does not exist', async () => {
    await expect(
      updateSnippet(con, 42, { title: 'Nope' }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('deleteSnippet', () => {
  it('should remove the snippet', async () => {
    const [snippet] = await saveSnippetFixtures(con);
    await deleteSnippet(con, snippet.id);

    await expect(getSnippet(con, snippet.id)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(await countSnippets()).toEqual(2);
  });

  it('should throw when the snippet does not exist', async () => {
    await expect(deleteSnippet(con, 42)).rejects.toMatchObject({
      message: 'Snippet not found',
      extensions: { code: 'NOT_FOUND' },
    });
  });

  it('should remove the snippets of a deleted user', async () => {
    await saveSnippetFixtures(con);
    await con.getRepository(User).delete({ id: '1' });

    const snippets = await listSnippets(con, { limit: 10 });
    expect(snippets.map(({ id }) => id)).toEqual([3]);
  });
});

describe('listSnippets', () => {
  it('should list the snippets oldest first', async () => {
    await saveSnippetFixtures(con);
    const snippets = await listSnippets(con, { limit: 10 });
    expect(snippets.map(({ id }) => id)).toEqual([1, 2, 3]);
  });

  it('should page through the snippets', async () => {
    await saveSnippetFixtures(con);
    const snippets = await listSnippets(con, { limit: 2, offset: 1 });
    expect(snippets.map(({ id }) => id)).toEqual([2, 3]);
  });

  it('should filter by owner', async () => {
    await saveSnippetFixtures(con);
    const snippets = await listSnippets(con, { limit: 10, ownerId: '1' });
    expect(snippets.map(({ id }) => id)).toEqual([1, 2]);
  });

  it('should return an empty page', async () => {
    expect(await listSnippets(con, { limit: 10 })).toEqual([]);
  });
});

describe('parseSnippetId', () => {
  it('should parse a numeric id', () => {
    expect(parseSnippetId('7')).toEqual(7);
    expect(parseSnippetId(7)).toEqual(7);
  });

  it('should throw not found for anything else', () => {
    expect(() => parseSnippetId('abc')).toThrow(NotFoundError);
    expect(() => parseSnippetId('0')).toThrow('Snippet not found');
    expect(() => parseSnippetId('99999999999')).toThrow(NotFoundError);
  });
});
