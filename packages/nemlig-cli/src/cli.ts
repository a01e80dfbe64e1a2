import { NemligClient, NemligHttpError, type LoginOptions, type NemligCredentials } from 'nemlig-client';
import { USAGE, UsageError, parseCliArgs } from './args.js';
import { consoleOutput, runCommand, type Output } from './commands.js';
import { resolveConfig } from './config.js';

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  output: Output;
  connect: (credentials: NemligCredentials, options: LoginOptions) => Promise<NemligClient>;
}

const defaultDependencies: CliDependencies = {
  env: process.env,
  output: consoleOutput,
  connect: (credentials, options) => NemligClient.login(credentials, options),
};

/**
 * Print an error to stderr and map it to an exit code.
 */
export function reportError(error: unknown, output: Output): number {
  if (error instanceof UsageError) {
    output.err(`Error: ${error.message}`);
    output.err('Run with --help for usage.');
  } else if (error instanceof NemligHttpError) {
    output.err(`HTTP Error: ${error.message}`);
    if (error.body) {
      output.err(`Response: ${error.body}`);
    }
  } else if (error instanceof Error) {
    output.err(`Error: ${error.message}`);
  } else {
    output.err(`Error: ${String(error)}`);
  }
  return 1;
}

/**
 * CLI entry point: parse, authenticate, run one command.
 *
 * @param argv - Arguments without the node and script entries
 * @returns Process exit code (0 success, 1 any handled failure)
 */
export async function main(argv: string[], deps: Partial<CliDependencies> = {}): Promise<number> {
  const { env, output, connect } = { ...defaultDependencies, ...deps };

  try {
    const parsed = parseCliArgs(argv);
    if (parsed.help) {
      output.out(USAGE);
      return 0;
    }

    const config = resolveConfig(parsed.options, env);
    const client = await connect(config.credentials, { debug: config.debug });
    return await runCommand(client, parsed.command, output);
  } catch (error) {
    return reportError(error, output);
  }
}
