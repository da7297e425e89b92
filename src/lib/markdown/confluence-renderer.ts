import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from '../config.js';
import { buildDiagramUrl } from './diagram.js';
import { attachmentName, escapeCdata, escapeXml, isExternalUrl } from './url.js';

/**
 * One callback per Markdown node kind the Confluence output differs on,
 * plus the whole-document layout run once the body is rendered.
 * Arguments are already-rendered inline HTML where the node has children.
 */
export interface ConfluenceVisitor {
  renderHeading(text: string, level: number): string;
  renderBlockCode(code: string, lang?: string): string;
  renderDiagram(code: string): string;
  renderBlockQuote(innerHtml: string): string;
  renderImage(src: string, title: string | null, altText: string): string;
  renderLink(href: string, title: string | null, innerHtml: string): string;
  renderAuthors(): string;
  renderLayout(contentHtml: string): string;
}

/**
 * State collected while one document is rendered
 */
export interface RenderState {
  /** Local image paths in order of appearance, duplicates kept */
  attachments: string[];
  readonly authors: readonly string[];
  /** Set by any heading; no toc macro is emitted without one */
  hasToc: boolean;
  /** Text of the first h1, used as the page title instead of being rendered */
  topHeading: string | undefined;
  warnings: string[];
}

/**
 * Result of converting one post
 */
export interface RenderedDocument {
  readonly html: string;
  readonly attachments: readonly string[];
  /** Front matter title, else the first h1, else '' */
  readonly title: string;
  readonly warnings: readonly string[];
}

const DIAGRAM_LANGUAGE = 'mermaid';

/**
 * Renders Markdown nodes as Confluence storage format
 *
 * Holds mutable state for a single document: create one per conversion.
 */
export class ConfluenceRenderer implements ConfluenceVisitor {
  private readonly state: RenderState;
  private readonly options: RenderOptions;

  constructor(authors: readonly string[] = [], options: RenderOptions = DEFAULT_RENDER_OPTIONS) {
    this.state = {
      attachments: [],
      authors: [...authors],
      hasToc: false,
      topHeading: undefined,
      warnings: [],
    };
    this.options = options;
  }

  get attachments(): readonly string[] {
    return this.state.attachments;
  }

  get authors(): readonly string[] {
    return this.state.authors;
  }

  get hasToc(): boolean {
    return this.state.hasToc;
  }

  get topHeading(): string | undefined {
    return this.state.topHeading;
  }

  get warnings(): readonly string[] {
    return this.state.warnings;
  }

  /**
   * Record a warning about content that could not be carried over as written
   */
  warn(message: string): void {
    this.state.warnings.push(message);
  }

  /**
   * Headings mark the page as needing a toc. The first h1 becomes the page
   * title and is dropped from the body, since Confluence shows the title itself.
   */
  renderHeading(text: string, level: number): string {
    this.state.hasToc = true;

    if (level === 1 && this.state.topHeading === undefined) {
      this.state.topHeading = text;
      return '';
    }

    return `<h${level}>${text}</h${level}>\n`;
  }

  renderBlockCode(code: string, lang?: string): string {
    if (lang === DIAGRAM_LANGUAGE) {
      return this.renderDiagram(code);
    }

    return `<ac:structured-macro ac:name="code" ac:schema-version="1">
    <ac:parameter ac:name="language">${escapeXml(lang ?? '')}</ac:parameter>
    <ac:plain-text-body><![CDATA[${escapeCdata(code)}]]></ac:plain-text-body>
</ac:structured-macro>\n`;
  }

  /**
   * Mermaid diagrams become an external image served by the diagram service
   */
  renderDiagram(code: string): string {
    return this.externalImage(buildDiagramUrl(code, this.options));
  }

  /**
   * A quote holding a single paragraph loses its <p> wrapper
   */
  renderBlockQuote(innerHtml: string): string {
    const opening = innerHtml.match(/<p>/g)?.length ?? 0;
    const closing = innerHtml.match(/<\/p>/g)?.length ?? 0;
    const content = opening === 1 && closing === 1 ? innerHtml.replace('<p>', '').replace('</p>', '') : innerHtml;

    return `<blockquote>\n${content}</blockquote>\n`;
  }

  /**
   * External images are referenced by URL. Anything else is uploaded as an
   * attachment and referenced by file name.
   */
  renderImage(src: string, _title: string | null, _altText: string): string {
    if (isExternalUrl(src)) {
      return this.externalImage(src);
    }

    this.state.attachments.push(src);
    return `<ac:image><ri:attachment ri:filename="${escapeXml(attachmentName(src))}" /></ac:image>`;
  }

  /**
   * Links to other posts are rendered as their plain text, without inline
   * markup. Confluence page URLs carry the page id, which does not exist until
   * the ancestors are published.
   */
  renderLink(href: string, title: string | null, innerHtml: string): string {
    if (!isExternalUrl(href)) {
      this.warn(`Internal link "${href}" was rendered as plain text.`);
      return innerHtml.replace(/<[^>]*>/g, '');
    }

    const titleAttr = title ? ` title="${escapeXml(title)}"` : '';
    return `<a href="${escapeXml(href)}"${titleAttr}>${innerHtml}</a>`;
  }

  /**
   * Profile picture and user link per author. The continuation lines keep the
   * indentation of the markup already stored on published pages.
   */
  renderAuthors(): string {
    const authors = this.state.authors.map((key) => {
      const userKey = escapeXml(key);
      return `<ac:structured-macro ac:name="profile-picture" ac:schema-version="1">
                <ac:parameter ac:name="User"><ri:user ri:userkey="${userKey}" /></ac:parameter>
            </ac:structured-macro>&nbsp;
            <ac:link><ri:user ri:userkey="${userKey}" /></ac:link>`;
    });

    return `<h1>Authors</h1><p>${authors.join('<br />')}</p>`;
  }

  /**
   * Two sibling column macros: a sidebar with the toc and authors, then the content.
   * Every macro starts on a new line, so the page begins with a newline.
   */
  renderLayout(contentHtml: string): string {
    const toc = this.state.hasToc
      ? `
<h1>Table of Contents</h1>
<p><ac:structured-macro ac:name="toc" ac:schema-version="1">
    <ac:parameter ac:name="exclude">${escapeXml(this.options.tocExclude)}</ac:parameter>
</ac:structured-macro></p>`
      : '';

    const sidebar = this.column(this.options.sidebarWidth, toc + this.renderAuthors());
    const content = this.column(this.options.contentWidth, contentHtml);
    return sidebar + content;
  }

  /**
   * Freeze the collected state into the conversion result
   */
  toDocument(html: string, title?: string | null): RenderedDocument {
    return {
      html,
      attachments: [...this.state.attachments],
      title: title ?? this.state.topHeading ?? '',
      warnings: [...this.state.warnings],
    };
  }

  private externalImage(url: string): string {
    return `<ac:image><ri:url ri:value="${escapeXml(url)}" /></ac:image>`;
  }

  private column(width: string, content: string): string {
    return `
<ac:structured-macro ac:name="column" ac:schema-version="1">
    <ac:parameter ac:name="width">${escapeXml(width)}</ac:parameter>
    <ac:rich-text-body>${content}</ac:rich-text-body>
</ac:structured-macro>`;
  }
}
