#!/usr/bin/env node
import readline from 'node:readline';

import { tryParseFEN } from '../domain';
import type { BoardState } from '../domain';
import { parseConsoleArgs, USAGE } from './consoleSetup';
import { ConsoleSession } from './consoleSession';

function fail(msg: string): void {
  console.error(msg);
  process.exitCode = 1;
}

async function main(): Promise<void> {
  const parsed = parseConsoleArgs(process.argv.slice(2));
  if (!parsed.ok) {
    fail(`${parsed.error}\n${USAGE}`);
    return;
  }

  let initial: BoardState | undefined;
  if (parsed.value.fen !== null) {
    const r = tryParseFEN(parsed.value.fen);
    if (!r.ok) {
      fail(`Invalid FEN: ${r.error}`);
      return;
    }
    initial = r.value;
  }

  const session = new ConsoleSession(parsed.value, initial);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });

  console.log(session.boardText());
  if (!session.isFinished()) {
    process.stdout.write('Your move: ');
    for await (const line of rl) {
      const out = session.handleLine(line);
      if (out) console.log(out);
      if (session.isFinished()) break;
      process.stdout.write('Your move: ');
    }
  }
  rl.close();
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
