export type MultipartPart = {
  headers: Record<string, string>;
  data: Buffer;
};

const CRLF = Buffer.from("\r\n");
const HEADER_END = Buffer.from("\r\n\r\n");

export function getBoundary(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = /boundary=(?:"([^"]+)"|([^;\s]+))/i.exec(contentType);
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
}

function parseHeaders(raw: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of raw.split("\r\n")) {
    const idx = line.indexOf(":");
    if (idx <= 0) continue;
    headers[line.slice(0, idx).trim().toLowerCase()] = line.slice(idx + 1).trim();
  }
  return headers;
}

/** Split a multipart body into its parts (preamble and epilogue dropped). */
export function parseMultipart(body: Buffer, boundary: string): MultipartPart[] {
  const delimiter = Buffer.from(`--${boundary}`);
  const parts: MultipartPart[] = [];

  let start = body.indexOf(delimiter);
  while (start !== -1) {
    let cursor = start + delimiter.length;
    if (body.subarray(cursor, cursor + 2).toString() === "--") break;
    if (body.subarray(cursor, cursor + 2).equals(CRLF)) cursor += 2;

    const next = body.indexOf(delimiter, cursor);
    if (next === -1) break;

    // the CRLF before a delimiter belongs to the delimiter
    let end = next;
    if (end >= 2 && body.subarray(end - 2, end).equals(CRLF)) end -= 2;

    const segment = body.subarray(cursor, end);
    const headerEnd = segment.indexOf(HEADER_END);
    if (headerEnd === -1) {
      parts.push({ headers: {}, data: Buffer.from(segment) });
    } else {
      parts.push({
        headers: parseHeaders(segment.subarray(0, headerEnd).toString("utf8")),
        data: Buffer.from(segment.subarray(headerEnd + HEADER_END.length)),
      });
    }
    start = next;
  }
  return parts;
}

export function getDispositionName(headers: Record<string, string>): string | null {
  const disposition = headers["content-disposition"];
  if (!disposition) return null;
  const match = /\bname="([^"]*)"/i.exec(disposition);
  return match ? match[1] : null;
}
