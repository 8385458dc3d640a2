/**
 * Command-line interface
 *
 * Runs one simulation and prints the filled-in Venn diagram (with --template)
 * or the probability of agreement for every subset. Progress goes to stderr.
 */

import yargs from 'yargs';
import { MonteCarloSimulator } from '../simulation/MonteCarloSimulator';
import { presetConfig, resolveConfig, type SimulationConfig, type SimulationConfigInput } from '../simulation/config';
import type { AgreementResult } from '../domain/results/AgreementResult';
import { formatProbability, loadVennTemplate, renderVennDiagram } from '../venn/VennTemplate';
import { EmmError, ErrorCode, isEmmError } from '../core/errors';

const PRESETS = ['figure1', 'figure2', 'appendixD'] as const;
const FORMATS = ['table', 'json', 'csv'] as const;

export type OutputFormat = (typeof FORMATS)[number];

export interface CliArgs {
  preset?: string;
  trials?: number;
  lower?: number;
  upper?: number;
  tent?: boolean;
  precision?: number;
  seed?: number;
  template?: string;
  format: OutputFormat;
  digits: number;
  debug: boolean;
}

export type Writer = (text: string) => void;

/**
 * Parse command-line arguments (without the node and script entries).
 * Unknown options and bad values throw INVALID_CONFIG.
 */
export function parseCliArgs(args: string[]): CliArgs {
  const argv = yargs(args)
    .scriptName('emm-venn')
    .usage('$0 [options]')
    .option('preset', { choices: PRESETS, describe: 'Settings of a published figure' })
    .option('trials', { type: 'number', describe: 'Number of trials (default 1000000)' })
    .option('lower', { type: 'number', describe: 'Lower risk bound (default 0)' })
    .option('upper', { type: 'number', describe: 'Upper risk bound (default 1)' })
    .option('tent', { type: 'boolean', describe: 'Tent sampling of treatment risks (default on)' })
    .option('precision', { type: 'number', describe: 'Bisection precision (default: trials)' })
    .option('seed', { type: 'number', describe: 'Seed for reproducible runs' })
    .option('template', { type: 'string', describe: 'Venn diagram SVG to fill in' })
    .option('format', { choices: FORMATS, describe: 'Output without a template (default table)' })
    .option('digits', { type: 'number', default: 6, describe: 'Decimal places' })
    .option('debug', { type: 'boolean', default: false })
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw new EmmError(ErrorCode.INVALID_CONFIG, message || error?.message || 'Invalid arguments', {
        args,
      });
    })
    .parseSync();

  return {
    preset: argv.preset,
    trials: argv.trials,
    lower: argv.lower,
    upper: argv.upper,
    tent: argv.tent,
    precision: argv.precision,
    seed: argv.seed,
    template: argv.template,
    format: argv.format ?? 'table',
    digits: argv.digits,
    debug: argv.debug,
  };
}

/**
 * Preset first, then every flag that was given on top of it
 */
export function configFromArgs(args: CliArgs): SimulationConfig {
  const config: SimulationConfigInput = args.preset !== undefined ? presetConfig(args.preset) : {};
  if (args.trials !== undefined) config.trialCount = args.trials;
  if (args.lower !== undefined) config.lowerBound = args.lower;
  if (args.upper !== undefined) config.upperBound = args.upper;
  if (args.tent !== undefined) config.tentMode = args.tent;
  if (args.precision !== undefined) config.bisectionPrecision = args.precision;
  if (args.seed !== undefined) config.seed = args.seed;
  config.debug = args.debug;

  return resolveConfig(config);
}

function renderTable(result: AgreementResult, digits: number): string {
  return result
    .entries()
    .map(
      (entry) =>
        `${entry.code || '-'}\t${formatProbability(entry.probability, digits)}\t${entry.count}`
    )
    .join('\n');
}

function renderResult(result: AgreementResult, format: OutputFormat, digits: number): string {
  return format === 'table' ? renderTable(result, digits) : result.export(format);
}

/**
 * Run the CLI and return its exit code. Errors are reported on stderr.
 */
export async function runCli(
  args: string[],
  write: Writer = (text) => process.stdout.write(text)
): Promise<number> {
  try {
    const options = parseCliArgs(args);
    const config = configFromArgs(options);

    // Load before simulating so a bad path fails fast
    const template =
      options.template !== undefined ? await loadVennTemplate(options.template) : undefined;

    const simulator = new MonteCarloSimulator(config);
    console.error(
      `Running ${config.trialCount} trials (${config.tentMode ? 'tent' : 'independent'} sampling)`
    );

    let lastDecile = 0;
    const result = simulator.run((progress) => {
      const decile = Math.floor(progress * 10);
      if (decile > lastDecile) {
        lastDecile = decile;
        console.error(`  ${decile * 10}%`);
      }
    });
    console.error(`Finished in ${(result.getMetadata().computeTime / 1000).toFixed(1)}s`);

    const output =
      template !== undefined
        ? renderVennDiagram(template, (code) => result.probability(code), options.digits)
        : renderResult(result, options.format, options.digits);
    write(output.endsWith('\n') ? output : `${output}\n`);
    return 0;
  } catch (error) {
    console.error(isEmmError(error) ? error.toString() : error);
    return 1;
  }
}
