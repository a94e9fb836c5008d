/**
 * OPERATOR TEXT
 *
 * Everything the menu prints or reads is built or parsed here, so the
 * wording and the input rules can be tested without a terminal.
 */

import {OrderReceipt, Product, StoreError} from '../domain';
import {EntryProblem, MenuChoice, OrderEntry} from '../types';
import {formatForDisplay} from './products';
import {invalidQuantity, unknownListingNumber} from './errors';
import {Either, Left, Maybe, Right} from 'purify-ts';

const menuChoices = new Map<string, MenuChoice>([
  ['1', 'list'],
  ['2', 'total'],
  ['3', 'order'],
  ['4', 'quit'],
]);

// ============================================================================
// Menu
// ============================================================================

export function buildMenu(storeName: string): string[] {
  const title = `=== ${storeName} ===`;
  return [
    '',
    title,
    '1. List all products in store',
    '2. Show total amount in store',
    '3. Make an order',
    '4. Quit',
    '='.repeat(title.length),
  ];
}

export function parseMenuChoice(input: string): Maybe<MenuChoice> {
  return Maybe.fromNullable(menuChoices.get(input.trim()));
}

export function buildProductListing(products: Product[]): string[] {
  return [
    '',
    'Available Products:',
    '-----------------',
    ...products.map((product, index) => `${index + 1}. ${formatForDisplay(product)}`),
  ];
}

export function buildTotalQuantityMessage(total: number): string {
  return `Total amount of items in store: ${total}`;
}

// ============================================================================
// Order entry
// ============================================================================

/**
 * Parse one line of order entry: "<product number> <quantity>" or "done".
 * Product numbers are 1-based positions in the listing shown to the operator.
 */
export function parseOrderEntry(
  input: string,
  listing: Product[]
): Either<EntryProblem, OrderEntry> {
  const value = input.trim().toLowerCase();
  if (value === 'done') {
    return Right({kind: 'done'});
  }

  const tokens = value.split(/\s+/);
  if (tokens.length !== 2 || !/^\d+$/.test(tokens[0])) {
    return Left({kind: 'malformed', input});
  }

  const position = Number(tokens[0]);
  const product = listing[position - 1];
  if (position < 1 || !product) {
    return Left({kind: 'rejected', error: unknownListingNumber(position)});
  }

  // Quantities are plain decimal digits, like product numbers
  const quantity = Number(tokens[1]);
  if (!/^\d+$/.test(tokens[1]) || quantity < 1) {
    return Left({kind: 'rejected', error: invalidQuantity(tokens[1])});
  }

  return Right({kind: 'line', line: {product, quantity}});
}

export function buildLineAdded(product: Product, quantity: number): string {
  return `Added to order: ${quantity}x ${product.name}`;
}

// ============================================================================
// Results
// ============================================================================

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

export function buildOrderConfirmation(receipt: OrderReceipt): string {
  return `Order completed! Total price: ${formatAmount(receipt.total)}`;
}

export function buildOrderFailure(error: StoreError): string {
  return `Error processing order: ${error.message}`;
}
