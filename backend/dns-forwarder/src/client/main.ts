#!/usr/bin/env node
import { runDnsQueryCli } from './cli.js';

runDnsQueryCli(process.argv.slice(2), { log: (line) => console.log(line) }).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
