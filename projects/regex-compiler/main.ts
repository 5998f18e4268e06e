#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { runCli } from './regex-cli.js';

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 2;
  }
);
