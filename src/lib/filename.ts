/**
 * Filename helpers
 *
 * Stored names are derived from whatever the client sent, so they are reduced
 * to a single path segment over a small character set. The display name keeps
 * the original text and is only escaped where it reaches a header.
 */

export const FALLBACK_FILENAME = 'file';
const MAX_FILENAME_LENGTH = 120;
const MAX_EXTENSION_LENGTH = 20;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

/**
 * Last non-empty segment of a path written with either separator
 */
function lastSegment(name: string): string {
  const segments = name.split(/[\\/]+/).filter((segment) => segment !== '');
  return segments[segments.length - 1] ?? '';
}

function splitExtension(name: string): { stem: string; extension: string } {
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || name.length - dot > MAX_EXTENSION_LENGTH) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, dot), extension: name.slice(dot) };
}

/**
 * Reduce a client-supplied filename to a safe single segment.
 * Never returns an empty string, "." or "..".
 */
export function sanitizeFilename(name: string): string {
  const cleaned = lastSegment(name)
    .replace(CONTROL_CHARS, '')
    .replace(/\.{2,}/g, '.')
    .replace(/[^A-Za-z0-9._-]/g, '_')
    .replace(/_{2,}/g, '_')
    .replace(/^\.+/, '');

  if (/^[._]*$/.test(cleaned)) {
    return FALLBACK_FILENAME;
  }

  if (cleaned.length <= MAX_FILENAME_LENGTH) {
    return cleaned;
  }

  const { stem, extension } = splitExtension(cleaned);
  return stem.slice(0, MAX_FILENAME_LENGTH - extension.length) + extension;
}

/**
 * ASCII-only variant of a display name for the quoted filename parameter
 */
export function toHeaderFilename(displayName: string): string {
  const ascii = lastSegment(displayName)
    .replace(CONTROL_CHARS, '')
    .replace(/["\\]/g, '_')
    .replace(/[^\x20-\x7e]/g, '_')
    .trim();

  return ascii === '' ? 'download' : ascii;
}

function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Content-Disposition value for downloading an entry
 */
export function contentDisposition(displayName: string): string {
  const fallback = toHeaderFilename(displayName);
  const full = lastSegment(displayName).replace(CONTROL_CHARS, '');
  const encoded = encodeRfc5987(full === '' ? fallback : full);

  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/**
 * Label given to a shared text, e.g. text_20240115_103000.txt (UTC)
 */
export function textLabel(at: Date): string {
  const pad = (value: number): string => value.toString().padStart(2, '0');
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `text_${date}_${time}.txt`;
}
