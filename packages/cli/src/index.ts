import { CHECK_SHORTNAME, SEVERITY_EXIT_CODES } from '@storagecheck/shared';
import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then(({ output, exitCode }) => {
    process.stdout.write(`${output}\n`);
    process.exit(exitCode);
  })
  .catch((err: unknown) => {
    process.stdout.write(`${CHECK_SHORTNAME} UNKNOWN - ${String(err)}\n`);
    process.exit(SEVERITY_EXIT_CODES.UNKNOWN);
  });
