/**
 * Markdown to HTML
 *
 * Converts markdown to HTML with the unified pipeline. Template expressions
 * such as `{{title}}` or `{{{body}}}` survive the conversion untouched so the
 * result can still be compiled as a template.
 */

import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";
import rehypeStringify from "rehype-stringify";

/**
 * A function that turns source text into its rendered form.
 */
export type TextTransform = (text: string) => string;

/**
 * Text whose template expressions were swapped for placeholders.
 */
export interface ProtectedText {
  text: string;

  /** Placeholder → original expression */
  placeholders: Map<string, string>;
}

const TEMPLATE_EXPRESSION = /\{{2,}[^}]+\}{2,}/g;

const processor = unified()
  .use(remarkParse)
  .use(remarkGfm)
  .use(remarkRehype, { allowDangerousHtml: true })
  .use(rehypeStringify, { allowDangerousHtml: true });

/**
 * Replace template expressions with placeholders that markdown leaves alone.
 *
 * Placeholders are plain alphanumerics so neither emphasis parsing nor URL
 * normalization can alter them.
 */
export function protectTemplateExpressions(text: string): ProtectedText {
  const id = 100000 + Math.floor(Math.random() * 900000);
  const placeholders = new Map<string, string>();

  const protectedText = text.replace(TEMPLATE_EXPRESSION, (expression) => {
    const placeholder = `HBS${id}X${placeholders.size}X`;
    placeholders.set(placeholder, expression);
    return placeholder;
  });

  return { text: protectedText, placeholders };
}

/**
 * Put the original template expressions back.
 */
export function restoreTemplateExpressions(text: string, placeholders: Map<string, string>): string {
  let restored = text;
  for (const [placeholder, expression] of placeholders) {
    restored = restored.split(placeholder).join(expression);
  }
  return restored;
}

/**
 * Convert markdown to HTML.
 *
 * Blank input yields an empty string.
 *
 * @example
 * markdownToHtml("Hello **{{user}}**") // => "<p>Hello <strong>{{user}}</strong></p>"
 */
export const markdownToHtml: TextTransform = (markdown) => {
  if (!markdown.trim()) return "";

  const { text, placeholders } = protectTemplateExpressions(markdown);
  const html = String(processor.processSync(text));

  return placeholders.size > 0 ? restoreTemplateExpressions(html, placeholders) : html;
};
