import { createReadStream } from 'fs';

const LF = 0x0a;
const CR = 0x0d;
const CONT_MIN = 0x80;
const CONT_MAX = 0xbf;

/**
 * Counts lines the way a universal-newline text reader does: `\n`, `\r\n` and a
 * lone `\r` each end a line, and trailing text without a terminator is one more line.
 *
 * Input is raw UTF-8. Bytes that do not form a valid sequence are skipped, so
 * they never open a line on their own.
 */
export class LineTally {
  private lines = 0;
  private pendingCR = false;
  private openLine = false;
  /** Continuation bytes still expected by the current multi-byte sequence */
  private need = 0;
  private lower = CONT_MIN;
  private upper = CONT_MAX;

  push(chunk: Uint8Array): void {
    for (const byte of chunk) {
      if (this.pendingCR) {
        this.pendingCR = false;
        if (byte === LF) {
          continue;
        }
      }

      if (this.need > 0) {
        if (byte >= this.lower && byte <= this.upper) {
          this.need--;
          this.lower = CONT_MIN;
          this.upper = CONT_MAX;
          if (this.need === 0) {
            this.openLine = true;
          }
          continue;
        }
        // Truncated sequence: drop it and read this byte afresh.
        this.need = 0;
        this.lower = CONT_MIN;
        this.upper = CONT_MAX;
      }

      if (byte === LF) {
        this.lines++;
        this.openLine = false;
      } else if (byte === CR) {
        this.lines++;
        this.pendingCR = true;
        this.openLine = false;
      } else if (byte < 0x80) {
        this.openLine = true;
      } else {
        this.startSequence(byte);
      }
    }
  }

  total(): number {
    return this.openLine ? this.lines + 1 : this.lines;
  }

  private startSequence(lead: number): void {
    if (lead >= 0xc2 && lead <= 0xdf) {
      this.need = 1;
    } else if (lead >= 0xe0 && lead <= 0xef) {
      this.need = 2;
      if (lead === 0xe0) this.lower = 0xa0;
      if (lead === 0xed) this.upper = 0x9f;
    } else if (lead >= 0xf0 && lead <= 0xf4) {
      this.need = 3;
      if (lead === 0xf0) this.lower = 0x90;
      if (lead === 0xf4) this.upper = 0x8f;
    }
    // Anything else cannot start a sequence and is skipped.
  }
}

/**
 * Counts the lines of a digest file, streaming its raw bytes.
 */
export async function countLines(path: string): Promise<number> {
  const tally = new LineTally();
  const stream = createReadStream(path);
  for await (const chunk of stream) {
    if (chunk instanceof Uint8Array) {
      tally.push(chunk);
    }
  }
  return tally.total();
}
