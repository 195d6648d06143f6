/**
 * Response Formats
 *
 * Maps format names (`html`, `json`, ...) to the media types used for
 * negotiation and for the Content-Type of rendered responses.
 */

export type KnownFormat = 'html' | 'json' | 'text' | 'xml';

/** A known format or any custom format registered with {@link registerFormat}. */
export type Format = KnownFormat | (string & {});

const FORMAT_TYPES = new Map<string, string[]>([
  ['html', ['text/html', 'application/xhtml+xml']],
  ['json', ['application/json']],
  ['text', ['text/plain']],
  ['xml', ['application/xml', 'text/xml']],
]);

/**
 * Make a custom format negotiable and renderable.
 * The first media type is the one sent as Content-Type.
 */
export function registerFormat(format: string, ...mediaTypes: string[]): void {
  if (mediaTypes.length === 0) {
    throw new TypeError(`registerFormat('${format}') needs at least one media type`);
  }
  FORMAT_TYPES.set(format, mediaTypes.map((type) => type.toLowerCase()));
}

export function mediaTypesFor(format: string): readonly string[] {
  return FORMAT_TYPES.get(format) ?? [];
}

/**
 * Content-Type header value for a format
 */
export function contentTypeFor(format: string): string {
  const type = FORMAT_TYPES.get(format)?.[0] ?? 'application/octet-stream';
  return type.startsWith('text/') || type.endsWith('json') || type.endsWith('xml')
    ? `${type}; charset=utf-8`
    : type;
}

/**
 * Format for a media type or full Content-Type value
 */
export function formatForMediaType(contentType: string): Format | undefined {
  const type = contentType.split(';')[0]?.trim().toLowerCase();
  if (!type) return undefined;
  for (const [format, types] of FORMAT_TYPES) {
    if (types.includes(type)) return format;
  }
  return undefined;
}
