import * as fs from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { connect } from './Connector.js';
import { describeError } from './errors.js';
import { LineSplitter } from './LineSplitter.js';
import { parseUrl, SCHEME_DELIMITER } from './UrlParser.js';
import { UrlProcessor } from './UrlProcessor.js';
import type { ProbeOutput, Result } from './types.js';

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_DELAY_MS = 2 ** 31 - 1;

/** What the CLI should probe, decided from its arguments and environment. */
export type CliInput =
  | { mode: 'single'; url: string }
  | { mode: 'list'; filePath?: string };

function reportError(message: string): number {
  process.stderr.write(`Error: ${message}\n`);
  return 1;
}

/**
 * Reads the pause between attempts from `PROBE_DELAY_MS`.
 * @param raw The raw environment value.
 * @returns The delay in milliseconds (0 when unset), or an error message.
 */
export function readDelay(raw: string | undefined): Result<number, string> {
  if (raw === undefined || raw === '') {
    return { ok: true, value: 0 };
  }
  if (!/^\d+$/.test(raw) || Number(raw) > MAX_DELAY_MS) {
    return {
      ok: false,
      error: `PROBE_DELAY_MS must be an integer between 0 and ${MAX_DELAY_MS}, got "${raw}"`,
    };
  }
  return { ok: true, value: Number(raw) };
}

/**
 * Chooses between single-URL and list mode.
 * An argument containing `://` is a URL, any other argument a file path.
 * Without an argument, `TARGET_URL` is probed when set, stdin otherwise.
 * @param args The command-line arguments after the script name.
 * @param env The environment to read `TARGET_URL` from.
 * @returns The input to probe.
 */
export function resolveInput(
  args: string[],
  env: NodeJS.ProcessEnv
): CliInput {
  // Handle arguments passed via `npm start --`
  let arg = args[0];
  if (arg === '--' && args.length > 1) {
    arg = args[1];
  }

  if (arg !== undefined) {
    return arg.includes(SCHEME_DELIMITER)
      ? { mode: 'single', url: arg }
      : { mode: 'list', filePath: arg };
  }
  if (env.TARGET_URL) {
    return { mode: 'single', url: env.TARGET_URL };
  }
  return { mode: 'list' };
}

/**
 * Parses and connects to one URL, printing the result as a JSON line.
 * @param urlStr The URL to probe.
 * @returns The exit code: 0 when connected, 1 otherwise.
 */
export async function probeOne(urlStr: string): Promise<number> {
  const parsed = parseUrl(urlStr);
  if (!parsed.ok) {
    return reportError(describeError(parsed.error));
  }

  const { host, path: urlPath, port } = parsed.value;
  const output: ProbeOutput = { url: urlStr, connected: false, host, path: urlPath, port };

  const result = await connect(parsed.value);
  if (result.ok) {
    output.connected = true;
    result.value.destroy();
  } else {
    output.error = describeError(result.error);
  }

  process.stdout.write(`${JSON.stringify(output)}\n`);
  return output.connected ? 0 : 1;
}

/**
 * Streams a URL list through the splitter and processor to stdout.
 * @param filePathArg A file to read; stdin when absent.
 * @param delayMs Pause between two connection attempts.
 * @returns The exit code once every URL has been written out.
 */
export function probeList(
  filePathArg: string | undefined,
  delayMs: number
): Promise<number> {
  let inputStream: Readable;

  if (filePathArg) {
    const filePath = path.resolve(process.cwd(), filePathArg);
    if (!fs.existsSync(filePath)) {
      return Promise.resolve(reportError(`File not found: ${filePath}`));
    }
    if (fs.statSync(filePath).isDirectory()) {
      return Promise.resolve(
        reportError(`Path is a directory, not a file: ${filePath}`)
      );
    }
    inputStream = fs.createReadStream(filePath);
  } else {
    inputStream = process.stdin;
    process.stdin.setEncoding('utf8');
  }

  const lineSplitter = new LineSplitter();
  const urlProcessor = new UrlProcessor({ delayMs });

  return new Promise((resolve) => {
    inputStream.on('error', (err: Error) => {
      resolve(reportError(`Cannot read input: ${err.message}`));
    });

    inputStream
      .pipe(lineSplitter)
      .on('error', (err: Error) => {
        process.stderr.write(`Error reading input: ${err.message}\n`);
      })
      .pipe(urlProcessor)
      .on('error', (err: Error) => {
        process.stderr.write(`Error in processor: ${err.message}\n`);
      })
      // 'end' follows 'alldone' once the last line has been handed on.
      .on('end', () => {
        resolve(0);
      })
      .pipe(process.stdout)
      .on('error', (err: Error) => {
        // e.g. broken pipe
        process.stderr.write(`Error writing to stdout: ${err.message}\n`);
      });
  });
}

/**
 * Runs the CLI against the given arguments and environment.
 * @param args The command-line arguments after the script name.
 * @param env The process environment, with `.env` already applied.
 * @returns The exit code.
 */
export async function run(
  args: string[],
  env: NodeJS.ProcessEnv
): Promise<number> {
  const input = resolveInput(args, env);
  if (input.mode === 'single') {
    return probeOne(input.url);
  }

  const delay = readDelay(env.PROBE_DELAY_MS);
  if (!delay.ok) {
    return reportError(delay.error);
  }
  return probeList(input.filePath, delay.value);
}
