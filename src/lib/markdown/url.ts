import { posix } from 'node:path';

// Optional scheme, then "//" and the authority up to the path, query or fragment
const NETWORK_LOCATION = /^(?:[a-z][a-z0-9+.-]*:)?\/\/([^/?#]*)/i;

/**
 * Whether a link or image reference points at another host
 * Anything without a network location (relative paths, "/images/x.png",
 * "mailto:", "#anchor") is treated as local to the post
 */
export function isExternalUrl(href: string): boolean {
  const match = NETWORK_LOCATION.exec(href.trim());
  return match !== null && match[1] !== '';
}

/**
 * Name a local file is attached under: its final path segment
 */
export function attachmentName(path: string): string {
  return posix.basename(path.replace(/\\/g, '/'));
}

/**
 * Escape special XML characters for use in attributes
 * Converts: & < > " ' to their XML entity equivalents
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Escape CDATA sections by replacing ]]> with ]]]]><![CDATA[>
 * This allows code containing ]]> to be safely embedded in CDATA
 */
export function escapeCdata(text: string): string {
  return text.replace(/]]>/g, ']]]]><![CDATA[>');
}
