/**
 * Markdown Utilities
 *
 * Text transforms applied to markdown theme parameters and topic content.
 */

export {
  markdownToHtml,
  protectTemplateExpressions,
  restoreTemplateExpressions,
  type TextTransform,
  type ProtectedText,
} from "./markdown-to-html.js";
