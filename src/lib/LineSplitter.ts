import { Transform } from 'stream';
import type { TransformCallback } from 'stream';

/**
 * A Transform stream that turns a text stream into one chunk per URL line.
 *
 * Lines may span several input chunks. Each line is trimmed; blank lines and
 * `#` comments are skipped.
 *
 * @example
 * // Input: "http://a.com\n# note\n\n  http://b.com/x"
 * // Output (chunks): "http://a.com", "http://b.com/x"
 */
export class LineSplitter extends Transform {
  private buffer = '';

  /**
   * Constructs a new LineSplitter instance.
   */
  constructor() {
    // Text in, one string object per line out.
    super({ readableObjectMode: true });
  }

  /**
   * Appends the chunk to the pending text and emits every complete line.
   * @param chunk The chunk of text to split.
   * @param encoding The encoding of the chunk.
   * @param callback A function to call when the chunk has been consumed.
   */
  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.buffer += chunk.toString();

    let newlineIndex = this.buffer.indexOf('\n');
    while (newlineIndex !== -1) {
      this.pushLine(this.buffer.slice(0, newlineIndex));
      this.buffer = this.buffer.slice(newlineIndex + 1);
      newlineIndex = this.buffer.indexOf('\n');
    }

    callback();
  }

  /**
   * Emits the last line when the input does not end with a newline.
   * @param callback A function to call when the flush operation is complete.
   */
  _flush(callback: TransformCallback): void {
    this.pushLine(this.buffer);
    this.buffer = '';
    callback();
  }

  /**
   * Pushes a line unless it is blank or a comment.
   * @param raw The line without its `\n`.
   */
  private pushLine(raw: string): void {
    // trim() also drops the \r of CRLF input
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }
    this.push(line);
  }
}
