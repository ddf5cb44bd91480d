#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stdout, stderr, exit as processExit } from 'node:process';
import { run, type CliIO } from './program.js';

process.on('uncaughtException', err => {
  stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  processExit(1);
});

process.on('unhandledRejection', (err: unknown) => {
  if (err instanceof Error) {
    stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
});

const io: CliIO = {
  stdout: chunk => { stdout.write(chunk); },
  stderr: msg => { stderr.write(msg); },
  env   : process.env,
  cwd   : process.cwd(),
};

const code = await run(process.argv.slice(2), io);
process.exitCode = code;
