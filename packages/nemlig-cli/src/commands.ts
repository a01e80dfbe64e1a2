import {
  NemligLookupError,
  NemligProductNotFoundError,
  findBasketLine,
  formatBasket,
  formatBasketLine,
  formatKroner,
  formatOrderDetails,
  formatOrderHistory,
  formatProductDetails,
  formatProductListItem,
  getBasketTotal,
  type NemligClient,
  type OrderSummary,
} from 'nemlig-client';
import type { Command } from './args.js';

/**
 * Where command results (out) and diagnostics (err) are written.
 */
export interface Output {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: Output = {
  out: text => console.log(text),
  err: text => console.error(text),
};

type CommandOf<N extends Command['name']> = Extract<Command, { name: N }>;

export async function searchCommand(client: NemligClient, command: CommandOf<'search'>, output: Output): Promise<number> {
  output.err(`Searching for '${command.query}'...`);
  const products = await client.search(command.query, { limit: command.limit });

  if (!products.length) {
    output.out(`No products found for '${command.query}'`);
    return 1;
  }

  output.out(`\nFound ${products.length} products:\n`);
  for (const product of products) {
    output.out(formatProductListItem(product));
  }
  return 0;
}

export async function detailsCommand(client: NemligClient, command: CommandOf<'details'>, output: Output): Promise<number> {
  output.err(`Fetching details for product ${command.productId}...`);

  try {
    const product = await client.getProduct(command.productId);
    output.out(`\n${formatProductDetails(product)}`);
    return 0;
  } catch (error) {
    if (error instanceof NemligProductNotFoundError) {
      output.err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

export async function basketCommand(client: NemligClient, output: Output): Promise<number> {
  output.err('Fetching basket...');
  const basket = await client.getBasket();
  output.out(basket.lines.length ? `\n${formatBasket(basket)}` : formatBasket(basket));
  return 0;
}

export async function addCommand(client: NemligClient, command: CommandOf<'add'>, output: Output): Promise<number> {
  output.err(`Adding product ${command.productId} (quantity: ${command.quantity}) to basket...`);
  const basket = await client.addToBasket(command.productId, command.quantity);

  const added = findBasketLine(basket, command.productId);
  if (added) {
    output.out('\nAdded to basket:');
    output.out(formatBasketLine(added));
  } else {
    output.out(`Product ${command.productId} added to basket.`);
  }

  output.out(`\nBasket total: ${formatKroner(getBasketTotal(basket))} (${basket.lines.length} items)`);
  return 0;
}

export async function historyCommand(client: NemligClient, command: CommandOf<'history'>, output: Output): Promise<number> {
  if (command.orderId === undefined) {
    output.err('Fetching order history...');
    const history = await client.getOrderHistory({ skip: 0, take: command.limit });

    if (!history.orders.length) {
      output.out(formatOrderHistory(history));
      return 0;
    }

    output.out(`\n${formatOrderHistory(history)}`);
    output.out("\nUse 'history ORDER_ID' to see order details.");
    return 0;
  }

  output.err(`Fetching order ${command.orderId}...`);

  let order: OrderSummary;
  try {
    order = await client.findOrder(command.orderId);
  } catch (error) {
    if (error instanceof NemligLookupError) {
      output.err(error.message);
      return 1;
    }
    throw error;
  }

  const details = await client.getOrderDetails(command.orderId);
  output.out(`\n${formatOrderDetails(order, details.lines)}`);
  return 0;
}

/**
 * Run a parsed command against an authenticated client.
 *
 * @returns Process exit code
 */
export async function runCommand(client: NemligClient, command: Command, output: Output): Promise<number> {
  switch (command.name) {
    case 'search':
      return searchCommand(client, command, output);
    case 'details':
      return detailsCommand(client, command, output);
    case 'basket':
      return basketCommand(client, output);
    case 'add':
      return addCommand(client, command, output);
    case 'history':
      return historyCommand(client, command, output);
  }
}
