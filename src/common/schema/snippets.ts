import z from 'zod';
import {
  DEFAULT_SNIPPET_LANGUAGE,
  DEFAULT_SNIPPET_STYLE,
  SNIPPET_TITLE_MAX_LENGTH,
} from '../../config';
import { isSupportedStyle, resolveLanguage } from '../highlight';

const titleSchema = z.string().max(SNIPPET_TITLE_MAX_LENGTH);

const codeSchema = z.string().min(1, 'Code must not be empty');

// Aliases are stored under the grammar's canonical name
const languageSchema = z.string().transform((language, ctx) => {
  const resolved = resolveLanguage(language);
  if (!resolved) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `"${language}" is not a valid choice`,
    });
    return z.NEVER;
  }
  return resolved;
});

const styleSchema = z.string().refine(isSupportedStyle, (style) => ({
  message: `"${style}" is not a valid choice`,
}));

export const createSnippetSchema = z.object({
  code: codeSchema,
  title: titleSchema.default(''),
  linenos: z.boolean().default(false),
  language: languageSchema.default(DEFAULT_SNIPPET_LANGUAGE),
  style: styleSchema.default(DEFAULT_SNIPPET_STYLE),
});

// Unknown keys, such as owner or highlighted, are stripped
export const updateSnippetSchema = z.object({
  code: codeSchema.optional(),
  title: titleSchema.optional(),
  linenos: z.boolean().optional(),
  language: languageSchema.optional(),
  style: styleSchema.optional(),
});

export const snippetIdSchema = z.coerce
  .number()
  .int()
  .positive()
  .max(2147483647);

export type CreateSnippetInput = z.input<typeof createSnippetSchema>;
export type UpdateSnippetInput = z.input<typeof updateSnippetSchema>;
