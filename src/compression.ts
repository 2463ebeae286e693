/**
 * draw.io page compression envelope.
 *
 * draw.io's `Graph.compress` URL-encodes the page XML, raw-deflates the
 * bytes and base64-encodes the result; `Graph.decompress` reverses that.
 * Older files deflate the XML without URL-encoding, so decompression only
 * URL-decodes payloads that do not already start with markup.
 */

import { deflateRawSync, inflateRawSync } from 'node:zlib';
import { FormatError } from './errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export function compressXml(xml: string): string {
  const deflated = deflateRawSync(Buffer.from(encodeURIComponent(xml), 'utf-8'));
  return deflated.toString('base64');
}

export function decompressXml(payload: string, path?: string): string {
  const compact = payload.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact) || compact.length % 4 === 1) {
    throw new FormatError('MalformedCompression', 'Compressed page payload is not valid base64', {
      path,
      fragment: payload,
    });
  }

  let inflated: string;
  try {
    inflated = inflateRawSync(Buffer.from(compact, 'base64')).toString('utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FormatError('MalformedCompression', `Cannot inflate compressed page: ${reason}`, {
      path,
      fragment: payload,
    });
  }

  if (inflated.trimStart().startsWith('<')) return inflated;
  try {
    return decodeURIComponent(inflated);
  } catch {
    throw new FormatError('MalformedCompression', 'Inflated page payload is not URI-encoded XML', {
      path,
      fragment: inflated,
    });
  }
}
