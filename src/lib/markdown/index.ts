export {
  ConfluenceRenderer,
  type ConfluenceVisitor,
  type RenderedDocument,
  type RenderState,
} from './confluence-renderer.js';
export { buildDiagramUrl, type DiagramPayload, serializeDiagramPayload } from './diagram.js';
export {
  decodeFrontMatter,
  decodeFrontMatterEffect,
  FRONT_MATTER_BOUNDARY,
  parsePost,
  parsePostEffect,
  parsePostSource,
  parsePostSourceEffect,
  splitFrontMatter,
  type ParsedPost,
  type PostFrontMatter,
  type SplitPost,
} from './frontmatter.js';
export { convertPost, convertPostEffect, convertToConfluence, HtmlConverter } from './html-converter.js';
export { attachmentName, escapeCdata, escapeXml, isExternalUrl } from './url.js';
