export { main, reportError, type CliDependencies } from './cli.js';
export { USAGE, UsageError, parseCliArgs, type Command, type GlobalOptions, type ParsedArgs } from './args.js';
export { resolveConfig, type CliConfig } from './config.js';
export { consoleOutput, runCommand, type Output } from './commands.js';
