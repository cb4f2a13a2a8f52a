#!/usr/bin/env node
import { CliIO, runCli } from './commands';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const io: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readStdin,
  env: process.env,
  isTTY: Boolean(process.stdout.isTTY),
};

runCli(process.argv.slice(2), io).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error);
    process.exitCode = 2;
  }
);
