import { hideBin } from 'yargs/helpers';
import { runCli } from './runCli';

runCli(hideBin(process.argv)).then((code) => {
  process.exitCode = code;
});
