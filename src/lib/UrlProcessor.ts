import { Transform } from 'stream';
import { connect } from './Connector.js';
import { describeError } from './errors.js';
import { parseUrl } from './UrlParser.js';
import type { ProbeOutput } from './types.js';

// Type for the callback used by the _flush method
type FlushCallback = (error?: Error | null) => void;

export interface UrlProcessorOptions {
  /** Pause between two connection attempts, in milliseconds. */
  delayMs?: number;
}

/**
 * A Transform stream that receives URL strings (e.g. from `LineSplitter`),
 * parses each one, opens a TCP connection to it, closes it again and outputs
 * the result as a JSON line.
 *
 * Attempts run one after another and duplicates are probed once.
 */
export class UrlProcessor extends Transform {
  private seenUrls = new Set<string>();
  private delayMs: number;
  private taskQueue: (() => Promise<void>)[] = [];
  private isProcessing = false;
  private flushCallback: FlushCallback | null = null;
  private lastAttemptAt: number | null = null;

  /**
   * Constructs a new UrlProcessor instance.
   * @param options Optional settings, such as the pause between attempts.
   */
  constructor(options: UrlProcessorOptions = {}) {
    // Takes strings from LineSplitter, outputs JSON strings.
    super({ readableObjectMode: true, writableObjectMode: true });
    this.delayMs = options.delayMs ?? 0;
  }

  /**
   * Queues a connection attempt for each URL not seen before.
   * @param chunk A single URL line.
   * @param encoding Unused in object mode.
   * @param callback Called once the URL has been queued.
   */
  _transform(
    chunk: string,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    const urlStr = chunk.toString();

    if (this.seenUrls.has(urlStr)) {
      callback();
      return;
    }
    this.seenUrls.add(urlStr);

    this.taskQueue.push(() => this.processUrl(urlStr));
    this.processQueue().catch((err: unknown) => {
      this.destroy(err instanceof Error ? err : new Error(String(err)));
    });
    callback();
  }

  /**
   * Called when the input ends. Waits until every queued attempt finished
   * before signalling completion.
   * @param callback A function to call when every attempt has been reported.
   */
  _flush(callback: FlushCallback): void {
    if (this.taskQueue.length === 0 && !this.isProcessing) {
      callback();
      this.emit('alldone');
    } else {
      // processQueue calls it once the queue drains.
      this.flushCallback = callback;
    }
  }

  /**
   * Completes a pending flush once the queue is idle, then emits 'alldone'.
   */
  private checkAndFlush(): void {
    if (
      this.flushCallback &&
      this.taskQueue.length === 0 &&
      !this.isProcessing
    ) {
      this.flushCallback();
      this.flushCallback = null;
      this.emit('alldone');
    }
  }

  /**
   * Runs queued attempts sequentially. Each attempt starts at least
   * `delayMs` after the previous one finished, even when the queue ran dry
   * in between.
   */
  private async processQueue(): Promise<void> {
    if (this.isProcessing) return;
    this.isProcessing = true;

    while (this.taskQueue.length > 0) {
      const task = this.taskQueue.shift();
      if (task) {
        await this.waitForDelay();
        await task();
        this.lastAttemptAt = Date.now();
      }
    }

    this.isProcessing = false;
    this.checkAndFlush();
  }

  /**
   * Sleeps for whatever remains of `delayMs` since the last attempt.
   */
  private async waitForDelay(): Promise<void> {
    if (this.delayMs <= 0 || this.lastAttemptAt === null) return;

    const remaining = this.delayMs - (Date.now() - this.lastAttemptAt);
    if (remaining > 0) {
      await new Promise((resolve) => setTimeout(resolve, remaining));
    }
  }

  /**
   * Parses a URL, connects to it and closes the connection at once.
   * Parse failures are reported without a connection attempt.
   * @param urlStr The URL line to probe.
   */
  private async processUrl(urlStr: string): Promise<void> {
    const parsed = parseUrl(urlStr);
    if (!parsed.ok) {
      this.report({ url: urlStr, connected: false, error: describeError(parsed.error) });
      return;
    }

    const { host, path, port } = parsed.value;
    const output: ProbeOutput = { url: urlStr, connected: false, host, path, port };

    const result = await connect(parsed.value);
    if (result.ok) {
      output.connected = true;
      result.value.destroy();
    } else {
      output.error = describeError(result.error);
    }

    this.report(output);
  }

  /**
   * Pushes the JSON line for a probed URL, logging failures to stderr.
   * @param output The result of one probe.
   */
  private report(output: ProbeOutput): void {
    if (output.error !== undefined) {
      process.stderr.write(`[FAILED] ${output.url}: ${output.error}\n`);
    }
    this.push(`${JSON.stringify(output)}\n`);
  }
}
