export * from './lib/markdown/index.js';
export {
  DEFAULT_RENDER_OPTIONS,
  resolveRenderOptions,
  resolveRenderOptionsEffect,
  type DiagramTheme,
  type RenderOptions,
  type RenderOptionsInput,
} from './lib/config.js';
export {
  FileSystemError,
  isRenderError,
  ParseError,
  ValidationError,
  type RenderError,
} from './lib/errors.js';
