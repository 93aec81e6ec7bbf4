#!/usr/bin/env node

import { runCli } from './cli/index.js';
import { EXIT_CODES, getErrorMessage } from './utils/errors.js';

runCli()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', getErrorMessage(error));
    process.exit(EXIT_CODES.INTERNAL);
  });
