import { readFileSync } from 'node:fs';
import { Effect, pipe, Schema } from 'effect';
import { parse as parseYaml } from 'yaml';
import { isDebugEnabled } from '../config.js';
import { FileSystemError, ParseError, runSyncOrThrow, ValidationError } from '../errors.js';

export const FRONT_MATTER_BOUNDARY = '---';

/**
 * Unquoted numeric user keys decode from YAML as numbers
 */
const UserKeySchema = Schema.transform(Schema.Union(Schema.String, Schema.Number), Schema.String, {
  strict: true,
  decode: (key) => String(key),
  encode: (key) => key,
});

/**
 * Front matter keys the renderer reads
 * `author_keys` are Confluence user keys shown in the sidebar; `title` overrides the detected h1
 */
const RecognizedKeysSchema = Schema.Struct({
  title: Schema.optional(Schema.NullOr(Schema.String)),
  author_keys: Schema.optional(Schema.NullOr(Schema.Array(UserKeySchema))),
});

/**
 * Decoded front matter of a post
 * Keys other than `title` and `author_keys` are kept as decoded from YAML
 */
export type PostFrontMatter = Schema.Schema.Type<typeof RecognizedKeysSchema> & Readonly<Record<string, unknown>>;

export interface SplitPost {
  frontMatterText: string;
  body: string;
}

export interface ParsedPost {
  frontMatter: PostFrontMatter;
  markdown: string;
}

/**
 * Split a post into its front matter text and Markdown body
 *
 * Every line up to the first `---` line is front matter. A `---` line only
 * closes the block once something has been collected, so an opening `---`
 * is kept as part of the YAML (where it reads as a document start marker).
 * The closing line itself is dropped and the body is trimmed.
 */
export function splitFrontMatter(text: string): SplitPost {
  const frontMatterLines: string[] = [];
  const bodyLines: string[] = [];
  let inFrontMatter = true;

  for (const line of text.split('\n')) {
    if (inFrontMatter && line.trim() === FRONT_MATTER_BOUNDARY && frontMatterLines.length > 0) {
      inFrontMatter = false;
      continue;
    }
    if (inFrontMatter) {
      frontMatterLines.push(line);
    } else {
      bodyLines.push(line);
    }
  }

  return {
    frontMatterText: frontMatterLines.join('\n'),
    body: bodyLines.join('\n').trim(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Effect-based YAML decode of front matter text
 * Empty front matter decodes to an empty mapping
 */
export function decodeFrontMatterEffect(text: string): Effect.Effect<PostFrontMatter, ParseError | ValidationError> {
  return pipe(
    Effect.try({
      try: (): unknown => parseYaml(text),
      catch: (error) =>
        new ParseError(`Invalid YAML in front matter: ${error instanceof Error ? error.message : String(error)}`),
    }),
    Effect.flatMap((data): Effect.Effect<Record<string, unknown>, ParseError> => {
      if (data === null || data === undefined) {
        return Effect.succeed({});
      }
      if (!isRecord(data)) {
        return Effect.fail(new ParseError(`Front matter must be a YAML mapping, got ${Array.isArray(data) ? 'a list' : typeof data}`));
      }
      return Effect.succeed(data);
    }),
    Effect.flatMap((data) =>
      pipe(
        Schema.decodeUnknown(RecognizedKeysSchema)(data),
        Effect.mapError((error) => new ValidationError(`Invalid front matter: ${error.message}`)),
        Effect.map((recognized): PostFrontMatter => ({ ...data, ...recognized })),
      ),
    ),
  );
}

/**
 * Sync wrapper for decodeFrontMatterEffect
 */
export function decodeFrontMatter(text: string): PostFrontMatter {
  return runSyncOrThrow(decodeFrontMatterEffect(text));
}

/**
 * Split a post's source and decode its front matter
 */
export function parsePostSourceEffect(source: string): Effect.Effect<ParsedPost, ParseError | ValidationError> {
  const { frontMatterText, body } = splitFrontMatter(source);
  return pipe(
    decodeFrontMatterEffect(frontMatterText),
    Effect.map((frontMatter) => ({ frontMatter, markdown: body })),
  );
}

export function parsePostSource(source: string): ParsedPost {
  return runSyncOrThrow(parsePostSourceEffect(source));
}

/**
 * Read a post from disk and parse it
 */
export function parsePostEffect(path: string): Effect.Effect<ParsedPost, FileSystemError | ParseError | ValidationError> {
  return pipe(
    Effect.try({
      try: () => readFileSync(path, 'utf-8'),
      catch: (error) =>
        new FileSystemError(`Failed to read post: ${error instanceof Error ? error.message : String(error)}`, path),
    }),
    Effect.flatMap(parsePostSourceEffect),
    Effect.tap(({ frontMatter, markdown }) =>
      Effect.sync(() => {
        if (isDebugEnabled()) {
          process.stderr.write(
            `[debug] parsePost: ${path} (front matter keys: ${Object.keys(frontMatter).join(', ') || 'none'}, body: ${markdown.length} chars)\n`,
          );
        }
      }),
    ),
  );
}

/**
 * Sync wrapper for parsePostEffect
 */
export function parsePost(path: string): ParsedPost {
  return runSyncOrThrow(parsePostEffect(path));
}
