/**
 * PURE ORDER LOGIC
 *
 * These functions take values and return values. No effects whatsoever.
 * The Store calls them to decide whether an order can be fulfilled and what
 * it costs, and only then commits the resulting inventory updates.
 *
 * Prices are plain numbers; rounding to cents happens only when an amount is
 * shown to the operator.
 */

import {LineCharge, OrderLine, OrderReceipt, Product, StoreError} from '../domain';
import {InventoryUpdate, OrderSimulation} from './types';
import {adjustQuantity, applyPurchase, checkPurchase} from './products';
import {productNotFound} from './errors';
import {Either, Maybe, Right} from 'purify-ts';

// ============================================================================
// Order Planning (validation phase)
// ============================================================================

export function findProduct(catalog: readonly Product[], productId: string): Maybe<Product> {
  return Maybe.fromNullable(catalog.find(product => product.id === productId));
}

/**
 * Check every line of an order against the catalog without changing it.
 *
 * 1. every referenced product must belong to the catalog
 * 2. lines are simulated in order on a working copy of the stock, so two
 *    lines for the same product see each other's decrement
 *
 * The first failure rejects the whole order.
 * @return either the first failure or the charge of every line
 */
export function planOrder(
  catalog: readonly Product[],
  lines: readonly OrderLine[]
): Either<StoreError, LineCharge[]> {
  const membership = Either.sequence(
    lines.map(line =>
      findProduct(catalog, line.product.id).toEither(productNotFound(line.product.name))
    )
  );

  return membership.chain(() =>
    lines
      .reduce<Either<StoreError, OrderSimulation>>(
        (acc, line) => acc.chain(simulation => simulateLine(simulation, line)),
        Right({stock: toStockMap(catalog), charges: []})
      )
      .map(simulation => simulation.charges)
  );
}

function toStockMap(catalog: readonly Product[]): ReadonlyMap<string, Product> {
  return new Map(catalog.map((product): [string, Product] => [product.id, product]));
}

function simulateLine(
  simulation: OrderSimulation,
  line: OrderLine
): Either<StoreError, OrderSimulation> {
  return Maybe.fromNullable(simulation.stock.get(line.product.id))
    .toEither(productNotFound(line.product.name))
    .chain(current =>
      checkPurchase(current, line.quantity).map(charge => ({
        stock: new Map(simulation.stock).set(current.id, applyPurchase(current, line.quantity)),
        charges: [...simulation.charges, charge],
      }))
    );
}

// ============================================================================
// Core Calculations
// ============================================================================

export function calculateOrderTotal(charges: LineCharge[]): number {
  return charges.reduce((sum, charge) => sum + charge.lineTotal, 0);
}

export function calculateItemCount(charges: LineCharge[]): number {
  return charges.reduce((sum, charge) => sum + charge.quantity, 0);
}

export function toOrderReceipt(charges: LineCharge[]): OrderReceipt {
  return {
    lines: charges,
    itemCount: calculateItemCount(charges),
    total: calculateOrderTotal(charges),
  };
}

// ============================================================================
// Inventory Updates (commit phase)
// ============================================================================

// One stock decrement per charged line; repeated products stay separate
export function calculateInventoryUpdates(charges: LineCharge[]): InventoryUpdate[] {
  return charges.map(({productId, quantity}) => ({productId, quantityChange: -quantity}));
}

/**
 * Apply planned stock changes to a catalog. Updates for non-stocked products
 * are ignored; the plan already guarantees no quantity goes below zero.
 */
export function applyInventoryUpdates(
  catalog: readonly Product[],
  updates: InventoryUpdate[]
): Product[] {
  const changes = updates.reduce(
    (acc, update) => acc.set(update.productId, (acc.get(update.productId) ?? 0) + update.quantityChange),
    new Map<string, number>()
  );
  return catalog.map(product => adjustQuantity(product, changes.get(product.id) ?? 0));
}

export function calculateTotalQuantity(catalog: readonly Product[]): number {
  return catalog.reduce(
    (sum, product) => sum + (product.kind === 'nonStocked' ? 0 : product.quantity),
    0
  );
}
