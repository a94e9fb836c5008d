/**
 * STORE ERRORS
 *
 * Expected failures are plain values carried in the Left side of an Either.
 * These builders keep the wording in one place so the menu and the tests
 * agree on what the operator sees.
 */

import {Product, StoreError} from '../domain';

export function invalidQuantity(quantity: number | string): StoreError {
  return {
    kind: 'InvalidQuantity',
    message: `Purchase quantity must be a positive whole number (got ${quantity})`,
  };
}

export function insufficientStock(product: Product, available: number, requested: number): StoreError {
  return {
    kind: 'InsufficientStock',
    message: `Not enough "${product.name}" available: requested ${requested}, in stock ${available}`,
  };
}

export function maxQuantityExceeded(product: Product, maximum: number): StoreError {
  return {
    kind: 'MaxQuantityExceeded',
    message: `Cannot purchase more than ${maximum} units of "${product.name}" in one order`,
  };
}

export function productNotFound(name: string): StoreError {
  return {
    kind: 'ProductNotFound',
    message: `Product "${name}" is not available in this store`,
  };
}

export function unknownListingNumber(position: number): StoreError {
  return {
    kind: 'ProductNotFound',
    message: `There is no product number ${position} in the listing`,
  };
}

export function invalidPromotionParameter(message: string): StoreError {
  return {kind: 'InvalidPromotionParameter', message};
}

export function invalidProduct(message: string): StoreError {
  return {kind: 'InvalidProduct', message};
}

export function notApplicable(product: Product): StoreError {
  return {
    kind: 'NotApplicable',
    message: `"${product.name}" is not a stocked product`,
  };
}
