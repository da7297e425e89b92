import { Buffer } from 'node:buffer';
import { DEFAULT_RENDER_OPTIONS, type RenderOptions } from '../config.js';

/**
 * Payload understood by mermaid.ink's /img endpoint
 */
export interface DiagramPayload {
  code: string;
  mermaid: { theme: RenderOptions['diagramTheme'] };
}

/**
 * Serialize the payload with `", "` / `": "` separators and every character
 * above U+007F written as a `\uXXXX` escape, so the encoded URL matches the
 * links already published for existing pages
 */
export function serializeDiagramPayload(payload: DiagramPayload): string {
  const json = `{"code": ${JSON.stringify(payload.code)}, "mermaid": {"theme": ${JSON.stringify(payload.mermaid.theme)}}}`;
  // Surrogate pairs are escaped one UTF-16 unit at a time
  return json.replace(/[\u0080-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

/**
 * Build the image URL for a Mermaid diagram
 * The source is JSON-encoded and base64'd into the path; nothing is fetched here
 */
export function buildDiagramUrl(
  code: string,
  options: Pick<RenderOptions, 'diagramServiceUrl' | 'diagramTheme'> = DEFAULT_RENDER_OPTIONS,
): string {
  const payload: DiagramPayload = { code, mermaid: { theme: options.diagramTheme } };
  const encoded = Buffer.from(serializeDiagramPayload(payload), 'utf-8').toString('base64');
  const base = options.diagramServiceUrl.replace(/\/+$/, '');
  return `${base}/${encoded}`;
}
