import { PIPELINE_ERROR_CODES, PipelineError } from '../core/errors.js';

const VERSION_MARKER = /Dumped from database version ([0-9.]+)/;

/**
 * Reads the server version pg_dump recorded in the dump header.
 */
export function extractServerVersion(dumpText: string): string {
  const match = VERSION_MARKER.exec(dumpText);
  if (!match || match[1].replace(/\./g, '').length === 0) {
    throw new PipelineError(
      PIPELINE_ERROR_CODES.VERSION_NOT_FOUND,
      'Dump does not contain a "Dumped from database version" marker'
    );
  }
  return match[1];
}

export function toImageTag(version: string): string {
  return version.replace(/\.+$/, '');
}
