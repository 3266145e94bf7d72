import hljs from 'highlight.js';
import { escape } from 'lodash';
import { z } from 'zod';
import themesJson from './themes.json';

const themeSchema = z.object({
  background: z.string(),
  foreground: z.string(),
  lineNumbers: z.object({
    color: z.string(),
    background: z.string(),
  }),
  tokens: z.record(z.string(), z.string()),
});

export type Theme = z.infer<typeof themeSchema>;

const themes: Record<string, Theme> = z
  .record(z.string(), themeSchema)
  .parse(themesJson);

/**
 * Every grammar highlight.js ships with, sorted by name.
 */
export const LANGUAGE_CHOICES: readonly string[] = [
  ...hljs.listLanguages(),
].sort();

export const STYLE_CHOICES: readonly string[] = Object.keys(themes).sort();

const languageAliases = new Map<string, string>(
  LANGUAGE_CHOICES.flatMap((name) =>
    (hljs.getLanguage(name)?.aliases ?? []).map(
      (alias): [string, string] => [alias, name],
    ),
  ),
);

/**
 * Canonical grammar name for a language or one of its aliases (py, js, sh).
 */
export const resolveLanguage = (language: string): string | undefined =>
  LANGUAGE_CHOICES.includes(language)
    ? language
    : languageAliases.get(language);

export const isSupportedLanguage = (language: string): boolean =>
  resolveLanguage(language) !== undefined;

export const isSupportedStyle = (style: string): boolean =>
  STYLE_CHOICES.includes(style);

export interface RenderSnippetOptions {
  code: string;
  language: string;
  style: string;
  linenos: boolean;
  title: string;
}

const getTheme = (style: string): Theme => {
  const theme = themes[style];
  if (!theme) {
    throw new Error(`unknown snippet style: ${style}`);
  }
  return theme;
};

export const getStyleDefs = (
  style: string,
  { linenos = false }: { linenos?: boolean } = {},
): string => {
  const theme = getTheme(style);
  const rules = [
    `.highlight { background: ${theme.background}; color: ${theme.foreground}; }`,
    ...Object.entries(theme.tokens).map(
      ([token, declarations]) =>
        `.highlight .hljs-${token} { ${declarations} }`,
    ),
  ];
  if (linenos) {
    rules.push(
      `td.linenos pre { color: ${theme.lineNumbers.color}; background-color: ${theme.lineNumbers.background}; padding: 0 5px; }`,
    );
  }
  return rules.join('\n');
};

const normalizeNewlines = (code: string): string =>
  code.replace(/\r\n?/g, '\n');

export const countLines = (code: string): number =>
  normalizeNewlines(code).replace(/\n$/, '').split('\n').length;

/**
 * Renders a snippet into a standalone HTML document: the theme's style
 * block, an optional heading and the highlighted code, optionally inside a
 * line-number table.
 */
export const renderSnippet = ({
  code,
  language,
  style,
  linenos,
  title,
}: RenderSnippetOptions): string => {
  const source = normalizeNewlines(code);
  const highlighted = hljs.highlight(source, {
    language,
    ignoreIllegals: true,
  }).value;
  const block = `<div class="highlight"><pre><code class="hljs language-${language}">${highlighted}</code></pre></div>`;

  let body = block;
  if (linenos) {
    const numbers = Array.from(
      { length: countLines(source) },
      (_, i) => `${i + 1}`,
    ).join('\n');
    body = `<table class="highlighttable"><tr><td class="linenos"><div class="linenodiv"><pre>${numbers}</pre></div></td><td class="code">${block}</td></tr></table>`;
  }

  const escapedTitle = escape(title);
  const heading = title ? `<h2>${escapedTitle}</h2>\n` : '';

  return `<!DOCTYPE html>
<html>
<head>
  <title>${escapedTitle}</title>
  <meta charset="utf-8">
  <style>
${getStyleDefs(style, { linenos })}
  </style>
</head>
<body>
${heading}${body}
</body>
</html>
`;
};
