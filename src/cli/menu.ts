/**
 * STORE MENU - The Coordinator
 *
 * This is the thin "effectful shell" around the store:
 * 1. Reads a choice from the operator (effects)
 * 2. Asks the store or the pure helpers for an answer
 * 3. Prints the result (effects)
 *
 * Parsing and wording live in ../pure/presentation.ts, pricing and stock
 * rules in the Store and ../pure; nothing here decides anything on its own.
 */

import {OrderLine} from '../domain';
import {AppEffects} from '../pure/effects';
import {Store} from '../store/Store';
import {
  buildLineAdded,
  buildMenu,
  buildOrderConfirmation,
  buildOrderFailure,
  buildProductListing,
  buildTotalQuantityMessage,
  formatAmount,
  parseMenuChoice,
  parseOrderEntry,
} from '../pure/presentation';

export type MenuOptions = {
  readonly storeName: string;
};

const ENTRY_HINT = "Enter product number and quantity (e.g., '1 5'), or 'done' to finish:";

/**
 * Run the menu until the operator quits or input ends.
 * @return a function running the loop with the given app effects
 */
export function runMenu(
  store: Store,
  options: MenuOptions
): (appEffects: AppEffects) => Promise<void> {
  return async (appEffects: AppEffects) => {
    const {terminal, logger} = appEffects;

    for (;;) {
      buildMenu(options.storeName).forEach(line => terminal.print(line));
      const input = (await terminal.prompt('\nEnter your choice (1-4): ')).extract();

      if (input === undefined) {
        logger.info('Input closed, leaving the menu');
        return;
      }

      const choice = parseMenuChoice(input).extract();
      if (choice === undefined) {
        terminal.print('\nInvalid choice! Please enter a number between 1 and 4.');
        continue;
      }

      switch (choice) {
        case 'list':
          listProducts(store)(appEffects);
          break;
        case 'total':
          terminal.print(`\n${buildTotalQuantityMessage(store.totalQuantity())}`);
          break;
        case 'order':
          if (!(await makeOrder(store)(appEffects))) return;
          break;
        case 'quit':
          terminal.print(`\nThank you for using the ${options.storeName}!`);
          return;
      }
    }
  };
}

export function listProducts(store: Store): (appEffects: AppEffects) => void {
  return ({terminal}: AppEffects) => {
    buildProductListing(store.listActiveProducts()).forEach(line => terminal.print(line));
  };
}

/**
 * Collect order lines from the operator and submit them as one order.
 * Any rejected line aborts the entry; nothing is submitted in that case.
 * @return false when input ended while collecting lines
 */
export function makeOrder(store: Store): (appEffects: AppEffects) => Promise<boolean> {
  return async (appEffects: AppEffects) => {
    const {terminal, logger} = appEffects;
    const listing = store.listActiveProducts();

    if (listing.length === 0) {
      terminal.print('\nNo active products available for purchase!');
      return true;
    }

    const lines: OrderLine[] = [];

    for (;;) {
      buildProductListing(listing).forEach(line => terminal.print(line));
      terminal.print(`\n${ENTRY_HINT}`);
      const input = (await terminal.prompt('> ')).extract();

      if (input === undefined) {
        logger.info(`Input closed during order entry, ${lines.length} line(s) discarded`);
        return false;
      }

      // Left and Right kinds are disjoint
      const step = parseOrderEntry(input, listing).extract();

      if (step.kind === 'done') break;
      if (step.kind === 'malformed') {
        terminal.print("Invalid input! Please use format 'product_number quantity'");
        continue;
      }
      if (step.kind === 'rejected') {
        logger.warn(`Order entry rejected (${step.error.kind}): ${step.error.message}`);
        terminal.print(`\n${buildOrderFailure(step.error)}`);
        return true;
      }

      lines.push(step.line);
      terminal.print(buildLineAdded(step.line.product, step.line.quantity));
    }

    if (lines.length === 0) {
      terminal.print('\nNo items in order!');
      return true;
    }

    store.order(lines).caseOf({
      Left: error => {
        logger.warn(`Order rejected (${error.kind}): ${error.message}`);
        terminal.print(`\n${buildOrderFailure(error)}`);
      },
      Right: receipt => {
        logger.info(`Order fulfilled: ${receipt.itemCount} item(s), total ${formatAmount(receipt.total)}`);
        terminal.print(`\n${buildOrderConfirmation(receipt)}`);
      },
    });
    return true;
  };
}
