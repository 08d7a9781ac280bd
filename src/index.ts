#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { main } from './cli.js';

main(hideBin(process.argv), {
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text)
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
