import { gunzipSync, gzipSync } from 'node:zlib';

import { PIPELINE_ERROR_CODES, PipelineError, describeError } from '../core/errors.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const GZIP_MAGIC = [0x1f, 0x8b] as const;

const decodeFailure = (message: string, cause?: unknown): PipelineError =>
  new PipelineError(
    PIPELINE_ERROR_CODES.DECODE_FAILED,
    message,
    cause === undefined ? {} : { cause }
  );

/**
 * Turns the base64(gzip(sql)) payload served by the challenge back into SQL text.
 */
export function decodeDump(encoded: string): string {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length === 0) {
    throw decodeFailure('Dump payload is empty');
  }
  if (!BASE64_PATTERN.test(compact)) {
    throw decodeFailure('Dump payload is not valid base64');
  }

  const compressed = Buffer.from(compact, 'base64');
  if (compressed.length < 2 || compressed[0] !== GZIP_MAGIC[0] || compressed[1] !== GZIP_MAGIC[1]) {
    throw decodeFailure('Dump payload is not gzip-compressed');
  }

  let raw: Buffer;
  try {
    raw = gunzipSync(compressed);
  } catch (error) {
    throw decodeFailure(`Failed to decompress dump: ${describeError(error)}`, error);
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch (error) {
    throw decodeFailure('Decompressed dump is not valid UTF-8', error);
  }
}

/**
 * Inverse of decodeDump.
 */
export function encodeDump(text: string): string {
  return gzipSync(Buffer.from(text, 'utf8')).toString('base64');
}
