#!/usr/bin/env tsx
/**
 * Entry point
 */

import { main } from './cli';
import { describeFailure } from './helpers';

main(process.argv.slice(2)).then(
  function(code) {
    process.exitCode = code;
  },
  function(err: unknown) {
    console.error(describeFailure(err));
    process.exitCode = 1;
  }
);
