export const ContentType = {
  json: 'application/json',
  text: 'text/plain',
  multipart: 'multipart/form-data',
  xml: 'application/xml',
  html: 'text/html',
  png: 'image/png',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
} as const;

export type ContentTypeName = keyof typeof ContentType;

/** `Content-Type: <type>` lines, ready to drop into a raw header block. */
export const ContentTypeHeader: Readonly<Record<ContentTypeName, string>> = {
  json: `Content-Type: ${ContentType.json}`,
  text: `Content-Type: ${ContentType.text}`,
  multipart: `Content-Type: ${ContentType.multipart}`,
  xml: `Content-Type: ${ContentType.xml}`,
  html: `Content-Type: ${ContentType.html}`,
  png: `Content-Type: ${ContentType.png}`,
  jpeg: `Content-Type: ${ContentType.jpeg}`,
  gif: `Content-Type: ${ContentType.gif}`,
  svg: `Content-Type: ${ContentType.svg}`,
};

export type HeaderEntry = [key: string, value: string];

/**
 * Split a raw header block into entries. Status lines and anything without a
 * colon are skipped, so a block holding several responses (redirects) still
 * parses; later entries win on lookup.
 */
export function parseHeaderBlock(block: string): HeaderEntry[] {
  const entries: HeaderEntry[] = [];
  for (const line of block.split(/\r?\n/)) {
    const separator = line.indexOf(':');
    if (separator <= 0 || line.startsWith('HTTP/')) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    if (key.length === 0) {
      continue;
    }
    entries.push([key, line.slice(separator + 1).trim()]);
  }
  return entries;
}

/** Case-insensitive lookup; the last matching line wins. */
export function findHeader(block: string, key: string): string | undefined {
  const wanted = key.toLowerCase();
  let found: string | undefined;
  for (const [name, value] of parseHeaderBlock(block)) {
    if (name.toLowerCase() === wanted) {
      found = value;
    }
  }
  return found;
}

export function headerBlockToRecord(block: string): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of parseHeaderBlock(block)) {
    record[key] = value;
  }
  return record;
}

export function serializeHeaders(entries: Iterable<HeaderEntry>): string {
  const lines: string[] = [];
  for (const [key, value] of entries) {
    lines.push(`${key}: ${value}`);
  }
  return lines.join('\r\n');
}

/** Append one line to a raw block, replacing any existing line with the same key. */
export function withHeader(block: string, key: string, value: string): string {
  const wanted = key.toLowerCase();
  const kept = parseHeaderBlock(block).filter(([name]) => name.toLowerCase() !== wanted);
  kept.push([key, value]);
  return serializeHeaders(kept);
}
