/**
 * @module Main
 * Command-line entry point. Probes a single URL given as an argument (or in
 * `TARGET_URL`), or a list of URLs read from a file or stdin, and prints one
 * JSON line per URL to stdout.
 */

import { run } from './lib/commands.js';

// Self-executing async function to handle conditional dotenv loading.
(async () => {
  // .env is only read outside production
  if (process.env.NODE_ENV !== 'production') {
    await import('dotenv/config');
  }

  const exitCode = await run(process.argv.slice(2), process.env);
  process.exit(exitCode);
})().catch((err: unknown) => {
  process.stderr.write(
    `Error: ${err instanceof Error ? err.message : String(err)}\n`
  );
  process.exit(1);
});
