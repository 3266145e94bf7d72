import type { Snippet } from '../entity';

export enum SnippetPermissions {
  View = 'view',
  Edit = 'edit',
  Delete = 'delete',
}

/**
 * Only the authenticated owner of a snippet may change or delete it.
 */
export const canWriteSnippet = (
  requesterId: string | null | undefined,
  snippet: Pick<Snippet, 'ownerId'>,
): boolean => !!requesterId && requesterId === snippet.ownerId;

export const hasSnippetPermission = (
  requesterId: string | null | undefined,
  snippet: Pick<Snippet, 'ownerId'>,
  permission: SnippetPermissions,
): boolean => {
  switch (permission) {
    case SnippetPermissions.View:
      return true;
    case SnippetPermissions.Edit:
    case SnippetPermissions.Delete:
      return canWriteSnippet(requesterId, snippet);
  }
};
