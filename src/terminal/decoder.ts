/**
 * Stateful UTF-8 decoder for a byte stream that arrives in arbitrary chunks.
 *
 * A multi-byte sequence cut in half by a chunk boundary is held back until
 * the rest arrives. Bytes that can never form valid UTF-8 are rendered as
 * `\xNN` escapes so they stay visible in matched output.
 */
export class IncrementalDecoder {
  private pending: Buffer = Buffer.alloc(0);

  decode(chunk: Uint8Array, final = false): string {
    const bytes = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : Buffer.from(chunk);
    this.pending = Buffer.alloc(0);

    let out = '';
    let runStart = 0;
    let i = 0;

    while (i < bytes.length) {
      const lead = bytes[i];
      if (lead < 0x80) {
        i++;
        continue;
      }

      const length = sequenceLength(lead);
      let valid = 1;
      while (valid < length && i + valid < bytes.length) {
        if (!isContinuation(lead, valid, bytes[i + valid])) {
          break;
        }
        valid++;
      }

      if (valid === length) {
        i += length;
        continue;
      }

      if (length > 0 && i + valid === bytes.length && !final) {
        // Truncated sequence at the end of the chunk; wait for the rest
        out += bytes.toString('utf8', runStart, i);
        this.pending = Buffer.from(bytes.subarray(i));
        return out;
      }

      out += bytes.toString('utf8', runStart, i);
      out += escapeBytes(bytes.subarray(i, i + valid));
      i += valid;
      runStart = i;
    }

    return out + bytes.toString('utf8', runStart, bytes.length);
  }

  /** Bytes held back waiting for the rest of a sequence */
  get pendingBytes(): number {
    return this.pending.length;
  }
}

function sequenceLength(lead: number): number {
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

// Second-byte ranges exclude overlongs, surrogates and code points past U+10FFFF
function isContinuation(lead: number, position: number, byte: number): boolean {
  if (position === 1) {
    if (lead === 0xe0) return byte >= 0xa0 && byte <= 0xbf;
    if (lead === 0xed) return byte >= 0x80 && byte <= 0x9f;
    if (lead === 0xf0) return byte >= 0x90 && byte <= 0xbf;
    if (lead === 0xf4) return byte >= 0x80 && byte <= 0x8f;
  }
  return byte >= 0x80 && byte <= 0xbf;
}

function escapeBytes(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    out += `\\x${byte.toString(16).padStart(2, '0')}`;
  }
  return out;
}
