import { promisify } from 'util';
import { gunzip } from 'zlib';
import { CodecError } from './errors';

const gunzipAsync = promisify(gunzip);

const NEWLINE = 0x0a;
const JSON_WHITESPACE = new Set([0x20, 0x09, 0x0d, 0x0a]);

function trimWhitespace(line: Buffer): Buffer {
  let start = 0;
  let end = line.length;
  while (start < end && JSON_WHITESPACE.has(line[start])) {
    start++;
  }
  while (end > start && JSON_WHITESPACE.has(line[end - 1])) {
    end--;
  }
  return line.subarray(start, end);
}

/**
 * Decompresses a GZIP object and yields its non-blank lines as undecoded bytes, trimmed of JSON whitespace,
 * in order. Lines are split on the newline byte, which never occurs inside a multi-byte UTF-8 sequence, so a
 * badly encoded line stays confined to itself. Concatenated GZIP members are read as one stream.
 * @param bytes The compressed object body.
 * @throws {CodecError} before the first line is yielded if the body is not valid GZIP.
 */
export async function* decode(bytes: Buffer): AsyncGenerator<Buffer> {
  let content: Buffer;
  try {
    content = await gunzipAsync(bytes);
  } catch (error) {
    throw new CodecError(`Unable to decompress object of ${bytes.length} bytes`, { cause: error });
  }

  let start = 0;
  while (start <= content.length) {
    let end = content.indexOf(NEWLINE, start);
    if (end === -1) {
      end = content.length;
    }

    const line = trimWhitespace(content.subarray(start, end));
    if (line.length > 0) {
      yield line;
    }

    start = end + 1;
  }
}

/**
 * Joins serialised records into an uncompressed JSON lines body. No trailing newline is written,
 * and no lines at all gives an empty body.
 */
export function encode(lines: Iterable<string>): Buffer {
  return Buffer.from(Array.from(lines).join('\n'), 'utf-8');
}
