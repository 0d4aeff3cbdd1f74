#!/usr/bin/env node

import { errorMessage } from './errors.js';
import { main } from './cli.js';

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 2;
  },
);
