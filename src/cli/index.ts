#!/usr/bin/env node
// ═══════════════════════════════════════════════════════════════════════════════
// CLI ENTRY — Interactive Question Loop on stdin/stdout
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   factbox
//   FACTBOX_PROVIDER=static FACTBOX_FIXTURES_PATH=data/fact-blocks.json factbox
//
// ═══════════════════════════════════════════════════════════════════════════════

import { createInterface, type Interface } from 'node:readline';
import { createQueryEngine } from '../bootstrap.js';
import { getLogger } from '../logging/index.js';
import { runSession } from './session.js';

export const PROMPT = 'Your query? ';

/**
 * Yields one line per prompt. Ends when the interface closes (Ctrl-D / Ctrl-C).
 */
async function* promptedLines(rl: Interface): AsyncGenerator<string> {
  const iterator = rl[Symbol.asyncIterator]();
  while (true) {
    rl.setPrompt(PROMPT);
    rl.prompt();
    const next = await iterator.next();
    if (next.done) return;
    yield next.value;
  }
}

async function main(): Promise<void> {
  const engine = await createQueryEngine();
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
  rl.on('SIGINT', () => rl.close());

  try {
    await runSession(promptedLines(rl), line => process.stdout.write(`${line}\n`), engine.dispatcher);
  } finally {
    rl.close();
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    getLogger({ component: 'cli' }).fatal('Query loop failed', error);
    process.exit(1);
  }
);
