#!/usr/bin/env node

import { config } from 'dotenv';

// Project .env, before anything reads process.env
config({ quiet: true });

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { cacheCommand } from './commands/cache.js';
import { configureLogger, isLogLevel } from '../logging/logger.js';
import { VERSION } from '../version.js';
import { EXIT_CODES } from '../constants.js';

const program = new Command();

const examples = `
Examples:

  Analyze a server launched over stdio:
    $ toolscope analyze "npx -y @modelcontextprotocol/server-everything"

  Analyze a running HTTP server, report as JSON:
    $ toolscope analyze http://localhost:3000/mcp --output-format json

  Pass environment to the launched server:
    $ toolscope analyze "node server.js" --env-vars '{"API_TOKEN":"test-secret"}'

  Inspect the tool-call cache:
    $ toolscope cache stats --server http://localhost:3000/mcp
`;

program
  .name('toolscope')
  .description('Structural diagnostics for MCP tool servers')
  .version(VERSION)
  .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
  .option('--log-file <path>', 'Write logs to file instead of stderr')
  .option('--log-pretty', 'Human-readable log lines')
  .hook('preAction', (thisCommand, actionCommand) => {
    const opts = (actionCommand ?? thisCommand).optsWithGlobals<{
      logLevel?: string;
      logFile?: string;
      logPretty?: boolean;
    }>();
    if (opts.logLevel !== undefined && !isLogLevel(opts.logLevel)) {
      thisCommand.error(`error: invalid log level '${opts.logLevel}'`);
    }
    if (opts.logLevel || opts.logFile || opts.logPretty) {
      configureLogger({
        level: isLogLevel(opts.logLevel) ? opts.logLevel : undefined,
        file: opts.logFile,
        pretty: opts.logPretty,
      });
    }
  })
  .addHelpText('after', examples);

program.addCommand(analyzeCommand);
program.addCommand(cacheCommand);

program.configureHelp({
  sortSubcommands: false,
  subcommandTerm: (cmd) => cmd.name() + ' ' + cmd.usage(),
});

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(EXIT_CODES.ERROR);
});
