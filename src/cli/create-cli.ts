import { Command } from 'commander';

import { SUPPORTED_BILLING_DIMENSIONS } from '../domain/billing-dimensions.js';
import { GATEWAY_PRICING_MODES } from '../domain/estimate-request.js';
import { createCliContext, type SharedCommandOptions } from './cli-context.js';
import { buildBatchReport, type BatchCommandOptions } from './run-batch.js';
import {
  buildModelsReport,
  buildProvidersReport,
  buildValidateReport,
  buildVersionsReport,
  type ModelsCommandOptions,
} from './run-catalog.js';
import { runCliAction } from './run-cli-action.js';
import { buildEstimateReport, type EstimateCommandOptions } from './run-estimate.js';

export type CreateCliOptions = {
  version?: string;
};

function collectRepeatedOption(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addSharedOptions(command: Command): Command {
  return command
    .option('--registry-dir <path>', 'Path to the pricing registry directory')
    .option('--markdown', 'Render output as markdown')
    .option('--json', 'Render output as JSON');
}

function createEstimateCommand(engineVersion: string): Command {
  const command = new Command('estimate');

  addSharedOptions(command)
    .description('Estimate the cost of one request')
    .option('--provider <id>', 'Provider id or alias')
    .option('--model <id>', 'Model id or alias')
    .option(
      '--usage <dimension=quantity>',
      `Usage quantity (repeatable). Dimensions: ${SUPPORTED_BILLING_DIMENSIONS.join(', ')}`,
      collectRepeatedOption,
      [],
    )
    .option('--mode <mode>', 'strict | lenient (default: strict)')
    .option('--pricing-version <version>', 'Pricing version to bill against (default: latest)')
    .option(
      '--gateway-pricing-mode <mode>',
      `${GATEWAY_PRICING_MODES.join(' | ')} (accepted, currently advisory only)`,
    )
    .option(
      '--override-rate <dimension=kind:value>',
      'Override rate such as input_tokens_uncached=per_1m:1.25 (repeatable, bypasses the registry)',
      collectRepeatedOption,
      [],
    )
    .option('--override-currency <code>', 'Currency of the override rates')
    .option('--request <file>', 'Read the request from a JSON document instead of flags')
    .action(async (options: EstimateCommandOptions) => {
      await runCliAction(options, () =>
        buildEstimateReport(options, createCliContext(options, { engineVersion })),
      );
    });

  return command;
}

function createBatchCommand(engineVersion: string): Command {
  const command = new Command('batch');

  addSharedOptions(command)
    .description('Estimate every item of a batch document; failed items do not stop the rest')
    .argument('<file>', 'JSON document of the form { "items": [request, ...] }')
    .action(async (file: string, options: BatchCommandOptions) => {
      await runCliAction(options, () =>
        buildBatchReport(file, createCliContext(options, { engineVersion })),
      );
    });

  return command;
}

function createCatalogCommands(engineVersion: string): Command[] {
  const providersCommand = addSharedOptions(new Command('providers'))
    .description('List providers with model counts and capabilities')
    .action(async (options: SharedCommandOptions) => {
      await runCliAction(options, () =>
        buildProvidersReport(createCliContext(options, { engineVersion })),
      );
    });

  const modelsCommand = addSharedOptions(new Command('models'))
    .description('List the models of a provider')
    .argument('<provider>', 'Provider id or alias')
    .option('--include-rates', 'Include billable rates')
    .action(async (provider: string, options: ModelsCommandOptions) => {
      await runCliAction(options, () =>
        buildModelsReport(provider, options, createCliContext(options, { engineVersion })),
      );
    });

  const versionsCommand = addSharedOptions(new Command('versions'))
    .description('Show the active pricing version')
    .action(async (options: SharedCommandOptions) => {
      await runCliAction(options, () =>
        buildVersionsReport(createCliContext(options, { engineVersion })),
      );
    });

  const validateCommand = addSharedOptions(new Command('validate'))
    .description('Load and validate every registry document')
    .action(async (options: SharedCommandOptions) => {
      await runCliAction(options, () =>
        buildValidateReport(createCliContext(options, { engineVersion })),
      );
    });

  return [providersCommand, modelsCommand, versionsCommand, validateCommand];
}

function rootDescription(): string {
  return [
    'Estimate LLM API costs from a versioned pricing registry',
    '',
    'Run `llm-cost <command> --help` to see command options.',
    '',
    'Examples:',
    '  $ llm-cost estimate --provider openai --model gpt-4.1-mini --usage input_tokens_uncached=1200 --usage output_tokens=350',
    '  $ llm-cost estimate --provider grok --model grok-4 --usage input_tokens_uncached=1000000 --json',
    '  $ llm-cost estimate --request ./request.json --markdown',
    '  $ llm-cost batch ./batch.json --json',
    '  $ llm-cost models openai --include-rates',
    '  $ llm-cost validate --registry-dir ./pricing',
  ].join('\n');
}

export function createCli(options: CreateCliOptions = {}): Command {
  const version = options.version ?? '0.0.0';
  const program = new Command();

  program
    .name('llm-cost')
    .description(rootDescription())
    .version(version)
    .showHelpAfterError()
    .addCommand(createEstimateCommand(version))
    .addCommand(createBatchCommand(version));

  for (const command of createCatalogCommands(version)) {
    program.addCommand(command);
  }

  return program;
}
