/**
 * TESTS FOR OPERATOR TEXT
 *
 * What the operator reads and types, checked without a terminal.
 */

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
import {makeNonStockedProduct, makeProduct} from '../pure/products';
import {invalidQuantity} from '../pure/errors';

const widget = makeProduct('Widget', 10, 5).unsafeCoerce();
const license = makeNonStockedProduct('License', 50).unsafeCoerce();
const listing = [widget, license];

describe('buildMenu', () => {
  it('frames the options with the store name', () => {
    expect(buildMenu('Shop')).toEqual([
      '',
      '=== Shop ===',
      '1. List all products in store',
      '2. Show total amount in store',
      '3. Make an order',
      '4. Quit',
      '============',
    ]);
  });
});

describe('parseMenuChoice', () => {
  it('maps the four options', () => {
    expect(['1', '2', '3', ' 4 '].map(input => parseMenuChoice(input).extract())).toEqual([
      'list',
      'total',
      'order',
      'quit',
    ]);
  });

  it('returns Nothing for anything else', () => {
    expect(parseMenuChoice('5').isNothing()).toBe(true);
    expect(parseMenuChoice('').isNothing()).toBe(true);
    expect(parseMenuChoice('toString').isNothing()).toBe(true);
  });
});

describe('buildProductListing', () => {
  it('numbers products from 1', () => {
    expect(buildProductListing(listing)).toEqual([
      '',
      'Available Products:',
      '-----------------',
      '1. Widget, Price: 10, Quantity: 5',
      '2. License, Price: 50',
    ]);
  });
});

describe('parseOrderEntry', () => {
  it('recognises done in any case', () => {
    expect(parseOrderEntry(' DONE ', listing).extract()).toEqual({kind: 'done'});
  });

  it('turns a product number and quantity into an order line', () => {
    expect(parseOrderEntry('2  3', listing).extract()).toEqual({
      kind: 'line',
      line: {product: license, quantity: 3},
    });
  });

  it('reports malformed input', () => {
    for (const input of ['', 'hello', '1', '1 2 3', 'x 2']) {
      expect(parseOrderEntry(input, listing).extract()).toEqual({kind: 'malformed', input});
    }
  });

  it('rejects product numbers outside the listing', () => {
    expect(parseOrderEntry('3 1', listing).extract()).toEqual({
      kind: 'rejected',
      error: {kind: 'ProductNotFound', message: 'There is no product number 3 in the listing'},
    });
    expect(parseOrderEntry('0 1', listing).extract()).toMatchObject({
      kind: 'rejected',
      error: {kind: 'ProductNotFound'},
    });
  });

  it('rejects quantities that are not positive whole numbers', () => {
    expect(parseOrderEntry('1 0', listing).extract()).toEqual({
      kind: 'rejected',
      error: invalidQuantity('0'),
    });
    expect(parseOrderEntry('1 two', listing).extract()).toEqual({
      kind: 'rejected',
      error: {kind: 'InvalidQuantity', message: 'Purchase quantity must be a positive whole number (got two)'},
    });
    expect(parseOrderEntry('1 -2', listing).extract()).toMatchObject({error: {kind: 'InvalidQuantity'}});
  });

  it('accepts only decimal digits as a quantity', () => {
    for (const token of ['1e3', '0x10', '1.0']) {
      expect(parseOrderEntry(`1 ${token}`, listing).extract()).toEqual({
        kind: 'rejected',
        error: invalidQuantity(token),
      });
    }
    expect(parseOrderEntry('1 007', listing).extract()).toEqual({
      kind: 'line',
      line: {product: widget, quantity: 7},
    });
  });
});

describe('messages', () => {
  it('formats amounts with two decimals', () => {
    expect(formatAmount(900)).toBe('900.00');
    expect(formatAmount(159.999)).toBe('160.00');
  });

  it('builds the order messages', () => {
    expect(buildLineAdded(widget, 2)).toBe('Added to order: 2x Widget');
    expect(buildTotalQuantityMessage(17)).toBe('Total amount of items in store: 17');
    expect(buildOrderConfirmation({lines: [], itemCount: 0, total: 1060})).toBe(
      'Order completed! Total price: 1060.00'
    );
    expect(buildOrderFailure(invalidQuantity(0))).toBe(
      'Error processing order: Purchase quantity must be a positive whole number (got 0)'
    );
  });
});
