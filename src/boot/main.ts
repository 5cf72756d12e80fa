/**
 * Entry point
 */

import { createProgram } from './cli';

createProgram().parseAsync(process.argv).catch(function(err: unknown) {
  console.error(err);
  process.exitCode = 1;
});
