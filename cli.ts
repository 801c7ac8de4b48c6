#!/usr/bin/env node
import { main, USAGE, UsageError } from './commands';
import { describeError } from './utils/errors';

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(`vecanim: ${describeError(err)}`);
  if (err instanceof UsageError) console.error(USAGE);
  process.exitCode = 1;
});
