import { parseArgs } from 'node:util';
import { NemligError } from 'nemlig-client';
import { z } from 'zod';

export const USAGE = `Usage: nemlig [-u USERNAME] [-p PASSWORD] [--debug] <command>

Commands:
  search <query> [-l|--limit N]      Search for products (default limit: 10)
  details <product_id>               Show detailed product info
  basket                             Show current basket
  add <product_id> [-q|--quantity N] Add product to basket (default quantity: 1)
  history [order_id] [-l|--limit N]  Show order history, or one order's details

Options:
  -u, --username   nemlig.com email/username (or NEMLIG_USER)
  -p, --password   nemlig.com password (or NEMLIG_PASS)
      --debug      Log requests to stderr (or NEMLIG_DEBUG=1)
  -h, --help       Show this help

Examples:
  nemlig -u EMAIL -p PASS search "cocio"
  nemlig -u EMAIL -p PASS details 701025
  nemlig -u EMAIL -p PASS add 701025 --quantity 2
  nemlig -u EMAIL -p PASS history 12345678`;

/**
 * Bad command-line input. Printed together with the usage text.
 */
export class UsageError extends NemligError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

export type Command =
  | { name: 'search'; query: string; limit: number }
  | { name: 'details'; productId: string }
  | { name: 'basket' }
  | { name: 'add'; productId: string; quantity: number }
  | { name: 'history'; orderId?: number; limit: number };

/**
 * Flags shared by all commands.
 */
export interface GlobalOptions {
  username?: string;
  password?: string;
  debug: boolean;
}

export type ParsedArgs =
  | { help: true }
  | { help: false; options: GlobalOptions; command: Command };

const OPTIONS = {
  username: { type: 'string', short: 'u' },
  password: { type: 'string', short: 'p' },
  limit: { type: 'string', short: 'l' },
  quantity: { type: 'string', short: 'q' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const DEFAULT_LIMIT = 10;
const DEFAULT_QUANTITY = 1;

const PositiveIntSchema = z.coerce.number().int().positive();

function parsePositiveInt(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  const result = PositiveIntSchema.safeParse(value);
  if (!result.success) {
    throw new UsageError(`${label} must be a positive integer, got '${value}'`);
  }
  return result.data;
}

function expectArity(name: string, args: string[], min: number, max: number): void {
  if (args.length < min) {
    throw new UsageError(`'${name}' is missing an argument`);
  }
  if (args.length > max) {
    throw new UsageError(`'${name}' got unexpected arguments: ${args.slice(max).join(' ')}`);
  }
}

function tokenize(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse argv (without the node and script entries) into a command.
 *
 * @throws UsageError on unknown options, missing arguments or bad numbers
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = tokenize(argv);
  if (values.help) {
    return { help: true };
  }

  const [name, ...args] = positionals;
  if (!name) {
    throw new UsageError('Missing command');
  }

  if (values.limit !== undefined && name !== 'search' && name !== 'history') {
    throw new UsageError(`'${name}' does not take --limit`);
  }
  if (values.quantity !== undefined && name !== 'add') {
    throw new UsageError(`'${name}' does not take --quantity`);
  }

  const options: GlobalOptions = {
    username: values.username,
    password: values.password,
    debug: values.debug ?? false,
  };

  switch (name) {
    case 'search':
      expectArity(name, args, 1, 1);
      return { help: false, options, command: { name, query: args[0], limit: parsePositiveInt(values.limit, DEFAULT_LIMIT, '--limit') } };
    case 'details':
      expectArity(name, args, 1, 1);
      return { help: false, options, command: { name, productId: args[0] } };
    case 'basket':
      expectArity(name, args, 0, 0);
      return { help: false, options, command: { name } };
    case 'add':
      expectArity(name, args, 1, 1);
      return {
        help: false,
        options,
        command: { name, productId: args[0], quantity: parsePositiveInt(values.quantity, DEFAULT_QUANTITY, '--quantity') },
      };
    case 'history':
      expectArity(name, args, 0, 1);
      return {
        help: false,
        options,
        command: {
          name,
          orderId: args.length ? parsePositiveInt(args[0], 0, 'order_id') : undefined,
          limit: parsePositiveInt(values.limit, DEFAULT_LIMIT, '--limit'),
        },
      };
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
