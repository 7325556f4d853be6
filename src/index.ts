#!/usr/bin/env node
import { createCLI } from './cli.js';
import { createActions } from './commands.js';
import { closeDatabase } from './db/index.js';

async function main() {
  // better-sqlite3 closes synchronously, so this also covers the MCP server shutting down
  process.on('exit', () => closeDatabase());

  const program = createCLI(createActions());
  await program.parseAsync();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
