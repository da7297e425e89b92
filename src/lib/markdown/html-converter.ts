import { Effect, pipe } from 'effect';
import { Marked, type Renderer, type Tokens } from 'marked';
import { DEFAULT_RENDER_OPTIONS, isDebugEnabled, type RenderOptions } from '../config.js';
import { type FileSystemError, type ParseError, runSyncOrThrow, type ValidationError } from '../errors.js';
import { ConfluenceRenderer, type RenderedDocument } from './confluence-renderer.js';
import { parsePostEffect, type PostFrontMatter } from './frontmatter.js';
import { escapeXml } from './url.js';

/**
 * HTML converter that transforms Markdown to Confluence Storage Format
 * Node callbacks are handed to a ConfluenceRenderer; the page layout is
 * assembled once the whole body has been rendered
 */
export class HtmlConverter {
  private readonly options: RenderOptions;

  constructor(options: RenderOptions = DEFAULT_RENDER_OPTIONS) {
    this.options = options;
  }

  /**
   * Create a Marked instance bound to one document's renderer
   * Uses marked v12+ token-based API
   */
  private createMarkedInstance(visitor: ConfluenceRenderer): Marked {
    const renderer: Partial<Renderer> = {
      // Headings - first h1 becomes the page title
      heading(this: Renderer, token: Tokens.Heading): string {
        const text = this.parser.parseInline(token.tokens);
        return visitor.renderHeading(text, token.depth);
      },

      // Code blocks - Confluence code macro, or a diagram image for mermaid
      code(this: Renderer, token: Tokens.Code): string {
        const lang = token.lang?.match(/^\S+/)?.[0];
        return visitor.renderBlockCode(token.text, lang);
      },

      // Blockquotes - single-paragraph quotes are unwrapped
      blockquote(this: Renderer, token: Tokens.Blockquote): string {
        const innerHtml = this.parser.parse(token.tokens);
        return visitor.renderBlockQuote(innerHtml);
      },

      // Images - attachments for local files, URL resources otherwise
      image(this: Renderer, token: Tokens.Image): string {
        return visitor.renderImage(token.href, token.title ?? null, token.text);
      },

      // Links - internal links degrade to their text
      link(this: Renderer, token: Tokens.Link): string {
        const text = this.parser.parseInline(token.tokens);
        return visitor.renderLink(token.href, token.title ?? null, text);
      },

      // Tables - standard XHTML tables work in Confluence
      table(this: Renderer, token: Tokens.Table): string {
        let header = '<tr>';
        for (const cell of token.header) {
          const align = cell.align ? ` style="text-align:${cell.align}"` : '';
          const content = this.parser.parseInline(cell.tokens);
          header += `<th${align}>${content}</th>`;
        }
        header += '</tr>\n';

        let body = '';
        for (const row of token.rows) {
          body += '<tr>';
          for (const cell of row) {
            const align = cell.align ? ` style="text-align:${cell.align}"` : '';
            const content = this.parser.parseInline(cell.tokens);
            body += `<td${align}>${content}</td>`;
          }
          body += '</tr>\n';
        }

        return `<table>
<thead>${header}</thead>
<tbody>${body}</tbody>
</table>\n`;
      },

      // Lists
      list(this: Renderer, token: Tokens.List): string {
        const tag = token.ordered ? 'ol' : 'ul';
        const startAttr = token.ordered && token.start !== 1 ? ` start="${token.start}"` : '';
        let body = '';
        for (const item of token.items) {
          // Remove wrapping <p> tags for simple list items
          const itemContent = this.parser.parse(item.tokens).replace(/^<p>(.*)<\/p>\n?$/s, '$1');
          body += `<li>${itemContent}</li>\n`;
        }
        return `<${tag}${startAttr}>\n${body}</${tag}>\n`;
      },

      // Line breaks
      br(this: Renderer): string {
        return '<br />';
      },

      // Horizontal rule
      hr(this: Renderer): string {
        return '<hr />\n';
      },

      // Raw HTML is shown as text; unbalanced tags would make the page invalid XHTML
      html(this: Renderer, token: Tokens.HTML | Tokens.Tag): string {
        if (token.block) {
          return `<p>${escapeXml(token.text.trim())}</p>\n`;
        }
        return escapeXml(token.text);
      },
    };

    return new Marked({
      gfm: true,
      breaks: false,
      renderer,
      hooks: {
        postprocess: (html: string) => visitor.renderLayout(html.trim()),
      },
    });
  }

  /**
   * Detect unsupported markdown features and add warnings
   */
  private detectUnsupportedFeatures(markdown: string, visitor: ConfluenceRenderer): void {
    // Check for task lists with checkboxes
    if (/^\s*-\s*\[[x ]\]/im.test(markdown)) {
      visitor.warn('Task list checkboxes (- [x]) will be converted to regular list items.');
    }

    // Check for footnotes
    if (/\[\^.+\]/.test(markdown)) {
      visitor.warn('Footnotes are not supported and will render as plain text.');
    }
  }

  /**
   * Convert a Markdown body to a Confluence page
   * A new renderer is created for every call, so one converter can be reused across posts
   */
  convert(markdown: string, frontMatter: PostFrontMatter = {}): RenderedDocument {
    const visitor = new ConfluenceRenderer(frontMatter.author_keys ?? [], this.options);

    this.detectUnsupportedFeatures(markdown, visitor);

    const html = this.createMarkedInstance(visitor).parse(markdown, { async: false });
    const document = visitor.toDocument(html, frontMatter.title);

    if (isDebugEnabled()) {
      process.stderr.write(
        `[debug] convert: title="${document.title}", attachments=${document.attachments.length}, warnings=${document.warnings.length}\n`,
      );
    }

    return document;
  }
}

/**
 * Convert a Markdown body and its front matter in one call
 */
export function convertToConfluence(
  markdown: string,
  frontMatter: PostFrontMatter = {},
  options: RenderOptions = DEFAULT_RENDER_OPTIONS,
): RenderedDocument {
  return new HtmlConverter(options).convert(markdown, frontMatter);
}

/**
 * Effect-based conversion of a post file
 */
export function convertPostEffect(
  path: string,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS,
): Effect.Effect<RenderedDocument, FileSystemError | ParseError | ValidationError> {
  return pipe(
    parsePostEffect(path),
    Effect.map(({ frontMatter, markdown }) => convertToConfluence(markdown, frontMatter, options)),
  );
}

/**
 * Sync wrapper for convertPostEffect
 */
export function convertPost(path: string, options: RenderOptions = DEFAULT_RENDER_OPTIONS): RenderedDocument {
  return runSyncOrThrow(convertPostEffect(path, options));
}
