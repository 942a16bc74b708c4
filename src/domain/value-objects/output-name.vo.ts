import * as path from 'path';

/** Signed artifacts are always written as MP4, whatever the input container. */
export const SIGNED_OUTPUT_EXTENSION = '.mp4';
export const SIGNED_OUTPUT_CONTENT_TYPE = 'video/mp4';

const UNSAFE_CHARACTERS = /[^A-Za-z0-9._-]+/g;

/**
 * Build the artifact name for a job:
 * `<base>_signed_<YYYYMMDD_HHMMSS>_<jobId prefix>.mp4` (UTC).
 */
export function buildOutputName(originalName: string, jobId: string, now: Date = new Date()): string {
  return `${safeBaseName(originalName)}_signed_${formatTimestamp(now)}_${jobId.slice(0, 8)}${SIGNED_OUTPUT_EXTENSION}`;
}

/**
 * Strip directories (either separator), the extension and anything outside
 * `[A-Za-z0-9._-]` from a client-supplied filename.
 */
export function safeBaseName(originalName: string): string {
  const fileName = path.posix.basename(originalName.replace(/\\/g, '/'));
  const extension = path.posix.extname(fileName);
  const stem = extension ? fileName.slice(0, -extension.length) : fileName;
  const cleaned = stem.replace(UNSAFE_CHARACTERS, '_').replace(/^[._]+/, '');

  return cleaned.length > 0 ? cleaned.slice(0, 100) : 'video';
}

function formatTimestamp(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
