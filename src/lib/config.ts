import { Effect, pipe, Schema } from 'effect';
import { runSyncOrThrow, ValidationError } from './errors.js';

export const DEFAULT_DIAGRAM_SERVICE_URL = 'https://mermaid.ink/img';
export const DEFAULT_TOC_EXCLUDE = '^(Authors|Table of Contents)$';

/**
 * Schema for the diagram image service base URL
 * Trailing slashes are tolerated and removed when the URL is built
 */
const DiagramServiceUrlSchema = Schema.String.pipe(
  Schema.pattern(/^https?:\/\/[^/\s]+/),
  Schema.annotations({
    message: () => 'Diagram service URL must be an http(s) URL',
  }),
);

/**
 * Column width as Confluence accepts it in the column macro (e.g. "30%", "800px")
 */
const ColumnWidthSchema = Schema.String.pipe(
  Schema.pattern(/^\d+(?:\.\d+)?(?:%|px)$/),
  Schema.annotations({
    message: () => 'Column width must be a percentage or pixel value (e.g. "30%" or "800px")',
  }),
);

const DiagramThemeSchema = Schema.Literal('default', 'neutral', 'dark', 'forest');

/**
 * Render options schema for mdconf
 * Every field is optional on input; defaults reproduce the standard page layout
 */
const RenderOptionsSchema = Schema.Struct({
  diagramServiceUrl: Schema.optionalWith(DiagramServiceUrlSchema, { default: () => DEFAULT_DIAGRAM_SERVICE_URL }),
  diagramTheme: Schema.optionalWith(DiagramThemeSchema, { default: () => 'default' as const }),
  sidebarWidth: Schema.optionalWith(ColumnWidthSchema, { default: () => '30%' }),
  contentWidth: Schema.optionalWith(ColumnWidthSchema, { default: () => '800px' }),
  tocExclude: Schema.optionalWith(Schema.String, { default: () => DEFAULT_TOC_EXCLUDE }),
});

export type RenderOptions = Schema.Schema.Type<typeof RenderOptionsSchema>;
export type RenderOptionsInput = Schema.Schema.Encoded<typeof RenderOptionsSchema>;
export type DiagramTheme = Schema.Schema.Type<typeof DiagramThemeSchema>;

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  diagramServiceUrl: DEFAULT_DIAGRAM_SERVICE_URL,
  diagramTheme: 'default',
  sidebarWidth: '30%',
  contentWidth: '800px',
  tocExclude: DEFAULT_TOC_EXCLUDE,
};

/**
 * Effect-based render option resolution with defaults applied
 */
export function resolveRenderOptionsEffect(input: unknown = {}): Effect.Effect<RenderOptions, ValidationError> {
  return pipe(
    Schema.decodeUnknown(RenderOptionsSchema)(input),
    Effect.mapError((error) => new ValidationError(`Invalid render options: ${error.message}`)),
  );
}

/**
 * Sync wrapper for resolveRenderOptionsEffect
 */
export function resolveRenderOptions(input: RenderOptionsInput = {}): RenderOptions {
  return runSyncOrThrow(resolveRenderOptionsEffect(input));
}

/**
 * Debug logging is enabled with MDCONF_DEBUG=1
 */
export function isDebugEnabled(): boolean {
  return process.env.MDCONF_DEBUG === '1';
}
