// ═══════════════════════════════════════════════════════════════
//  CLI entry point
// ═══════════════════════════════════════════════════════════════
//
//  Usage:
//    npm run generate -- --num-samples 50 --seed 42 --output data/questions
//    npm run generate -- --config task.json --no-videos
// ═══════════════════════════════════════════════════════════════

import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';

import { loadTaskConfig, type TaskConfigInput } from './config';
import { TaskGenerator } from './generator';

const USAGE = `Usage: vertical-bounce-generator [options]

  -c, --config <file>     JSON task configuration
  -n, --num-samples <n>   number of tasks to generate
  -o, --output <dir>      output directory
  -s, --seed <n>          random seed
      --no-videos         skip ground-truth videos
  -h, --help              show this message`;

export interface CliOptions {
  help: boolean;
  configPath?: string;
  overrides: Partial<TaskConfigInput>;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    options: {
      config:        { type: 'string', short: 'c' },
      'num-samples': { type: 'string', short: 'n' },
      output:        { type: 'string', short: 'o' },
      seed:          { type: 'string', short: 's' },
      'no-videos':   { type: 'boolean' },
      help:          { type: 'boolean', short: 'h' },
    },
  });

  const overrides: Partial<TaskConfigInput> = {};
  if (values['num-samples'] !== undefined) overrides.numSamples = Number(values['num-samples']);
  if (values.output !== undefined) overrides.outputDir = values.output;
  if (values.seed !== undefined) overrides.randomSeed = Number(values.seed);
  if (values['no-videos']) overrides.generateVideos = false;

  return { help: values.help ?? false, configPath: values.config, overrides };
}

export async function main(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = await loadTaskConfig(options.configPath, options.overrides);
  await new TaskGenerator(config).generateDataset();
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    },
  );
}
