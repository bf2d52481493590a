import { Command } from 'commander';
import { ToolCallCache } from '../../cache/tool-call-cache.js';
import { loadConfig } from '../../config/loader.js';
import { EXIT_CODES } from '../../constants.js';
import { getErrorMessage } from '../../errors/types.js';
import { formatCacheStats } from '../output/report-formatter.js';
import * as output from '../output.js';

interface CacheCommandOptions {
  server: string;
  config?: string;
  json?: boolean;
}

function openCache(options: CacheCommandOptions): ToolCallCache {
  try {
    const config = loadConfig(options.config);
    return new ToolCallCache({ server: options.server, dir: config.cache.dir });
  } catch (error) {
    output.error(getErrorMessage(error));
    process.exit(EXIT_CODES.ERROR);
  }
}

const statsCommand = new Command('stats')
  .description('Show cached tool calls for a server')
  .requiredOption('--server <identity>', 'Server identity (the analyzed target)')
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output as JSON')
  .action((options: CacheCommandOptions) => {
    const stats = openCache(options).getStats();
    if (options.json) {
      output.json(stats);
    } else {
      output.data(formatCacheStats(stats));
    }
  });

const clearCommand = new Command('clear')
  .description('Delete cached tool calls for a server, or for one of its tools')
  .argument('[operation]', 'Only clear this tool')
  .requiredOption('--server <identity>', 'Server identity (the analyzed target)')
  .option('-c, --config <path>', 'Path to config file')
  .action((operation: string | undefined, options: CacheCommandOptions) => {
    const cache = openCache(options);
    try {
      cache.clear(operation);
    } catch (error) {
      output.error(`Failed to clear cache: ${getErrorMessage(error)}`);
      process.exit(EXIT_CODES.ERROR);
    }
    output.success(
      operation
        ? `Cleared cached calls of ${operation} for ${options.server}`
        : `Cleared cached calls for ${options.server}`
    );
  });

export const cacheCommand = new Command('cache')
  .description('Inspect or clear the tool-call cache')
  .addCommand(statsCommand)
  .addCommand(clearCommand);
