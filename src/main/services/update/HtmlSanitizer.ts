import { marked } from 'marked';
import sanitizeHtml from 'sanitize-html';

export interface HtmlSanitizer {
  sanitize(raw: string): string;
}

// mesma allow-list usada para conteudo de post: texto rico, links, imagens, tabelas
const POST_CONTENT_OPTIONS: sanitizeHtml.IOptions = {
  allowedTags: sanitizeHtml.defaults.allowedTags.concat(['img', 'del', 'ins', 'sub', 'sup']),
  allowedAttributes: {
    a: ['href', 'title', 'target', 'rel'],
    img: ['src', 'alt', 'title', 'width', 'height'],
    th: ['colspan', 'rowspan', 'align'],
    td: ['colspan', 'rowspan', 'align'],
    '*': ['class']
  },
  allowedSchemes: ['http', 'https', 'mailto'],
  allowProtocolRelative: false
};

export class SanitizeHtmlSanitizer implements HtmlSanitizer {
  sanitize(raw: string): string {
    return sanitizeHtml(raw, POST_CONTENT_OPTIONS).trim();
  }
}

export function renderMarkdown(markdown: string): string {
  return marked.parser(marked.lexer(markdown));
}
