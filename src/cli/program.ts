import { createReadStream } from 'node:fs';
import { Command } from 'commander';
import { SHARPI_STREAMS } from '../config/sync/sharpi.js';
import { loadTargetConfig } from '../config/targetConfig.js';
import { SharpiClient } from '../services/sharpi/index.js';
import { TargetRunner } from '../services/target/index.js';
import { cliLogger } from '../utils/logger.js';
import { printSummary } from './format.js';

interface TargetCliOptions {
  config?: string;
  input?: string;
  about?: boolean;
}

export const ABOUT = {
  name: 'sharpi-target',
  description: 'Pushes products, prices and customers to the Sharpi partner API',
  streams: SHARPI_STREAMS,
  settings: ['api_key', 'base_url', 'duplicate_strategy', 'fail_fast'],
};

export function createProgram(): Command {
  const program: Command = new Command();

  program
    .name('sharpi-target')
    .description('Singer target for the Sharpi partner API, reading messages from stdin')
    .version('1.0.0')
    .option('-c, --config <path>', 'target config JSON file')
    .option('-i, --input <path>', 'read Singer messages from a file instead of stdin')
    .option('--about', 'print target capabilities and exit')
    .action(async (options: TargetCliOptions) => {
      if (options.about) {
        console.log(JSON.stringify(ABOUT, null, 2));
        return;
      }
      if (!options.config) {
        return program.error('--config is required');
      }

      const config = await loadTargetConfig(options.config);
      const client = new SharpiClient({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        duplicateStrategy: config.duplicateStrategy,
      });
      cliLogger.info({ baseUrl: client.getBaseUrl(), failFast: config.failFast }, 'Starting Sharpi target');

      const runner = new TargetRunner({ client, failFast: config.failFast });
      const input = options.input ? createReadStream(options.input, 'utf-8') : process.stdin;
      const summary = await runner.run(input);

      printSummary(summary);
      if (summary.failed > 0) {
        process.exitCode = 1;
      }
    });

  return program;
}
