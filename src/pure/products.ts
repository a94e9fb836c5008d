/**
 * PRODUCTS
 *
 * Catalog entries are immutable values. Every "change" returns a new snapshot
 * that keeps the product id, which is what identifies a product inside a store.
 *
 * Purchasing is split in two so a whole order can be checked before anything
 * is committed:
 *   checkPurchase  - read-only validation and pricing
 *   applyPurchase  - the stock decrement
 */

import {
  LimitedProduct,
  LineCharge,
  NonStockedProduct,
  Product,
  Promotion,
  StockedProduct,
  StoreError,
} from '../domain';
import {PurchaseResult} from './types';
import {applyPromotion} from './promotions';
import {insufficientStock, invalidProduct, invalidQuantity, maxQuantityExceeded, notApplicable} from './errors';
import {Either, Just, Left, Maybe, Nothing, Right} from 'purify-ts';
import {v4 as uuidv4} from 'uuid';

// ============================================================================
// Construction
// ============================================================================

export function makeProduct(
  name: string,
  price: number,
  quantity: number
): Either<StoreError, StockedProduct> {
  return validateName(name).chain(validName =>
    validatePrice(price).chain(validPrice =>
      validateQuantity(quantity).map((validQuantity): StockedProduct => ({
        kind: 'stocked',
        id: uuidv4(),
        name: validName,
        price: validPrice,
        quantity: validQuantity,
        promotion: null,
      }))
    )
  );
}

export function makeNonStockedProduct(
  name: string,
  price: number
): Either<StoreError, NonStockedProduct> {
  return validateName(name).chain(validName =>
    validatePrice(price).map((validPrice): NonStockedProduct => ({
      kind: 'nonStocked',
      id: uuidv4(),
      name: validName,
      price: validPrice,
      promotion: null,
    }))
  );
}

export function makeLimitedProduct(
  name: string,
  price: number,
  quantity: number,
  maximum: number
): Either<StoreError, LimitedProduct> {
  if (!Number.isInteger(maximum) || maximum <= 0) {
    return Left(invalidProduct('Maximum purchase quantity must be positive'));
  }
  return makeProduct(name, price, quantity).map((product): LimitedProduct => ({
    ...product,
    kind: 'limited',
    maximum,
  }));
}

// ============================================================================
// Queries
// ============================================================================

export function isStocked(product: Product): product is StockedProduct | LimitedProduct {
  return product.kind !== 'nonStocked';
}

export function isActive(product: Product): boolean {
  return isStocked(product) ? product.quantity > 0 : true;
}

export function getQuantity(product: Product): Maybe<number> {
  return isStocked(product) ? Just(product.quantity) : Nothing;
}

export function lineTotal(product: Product, quantity: number): number {
  if (!product.promotion) return product.price * quantity;
  return applyPromotion(product.promotion, product.price, quantity);
}

// Ascending by price, for Array.prototype.sort
export function compareByPrice(a: Product, b: Product): number {
  return a.price - b.price;
}

export function formatForDisplay(product: Product): string {
  const parts = [product.name, `Price: ${product.price}`];
  if (isStocked(product)) {
    parts.push(`Quantity: ${product.quantity}`);
  }
  if (product.promotion) {
    parts.push(`Promotion: ${product.promotion.name}`);
  }
  if (product.kind === 'limited') {
    parts.push(`Max per order: ${product.maximum}`);
  }
  return parts.join(', ');
}

// ============================================================================
// Updates
// ============================================================================

/**
 * Restock (or write down) a stocked product. This is the only way an
 * inactive product becomes active again.
 */
export function setQuantity(product: Product, quantity: number): Either<StoreError, Product> {
  if (!isStocked(product)) {
    return Left(notApplicable(product));
  }
  const stocked = product;
  return validateQuantity(quantity).map(validQuantity => ({...stocked, quantity: validQuantity}));
}

export function setPrice<P extends Product>(product: P, price: number): Either<StoreError, P> {
  return validatePrice(price).map(validPrice => ({...product, price: validPrice}));
}

export function setPromotion<P extends Product>(product: P, promotion: Promotion | null): P {
  return {...product, promotion};
}

// ============================================================================
// Purchasing
// ============================================================================

/**
 * Validate a purchase against the product as it is now, without touching it.
 * Checks run in a fixed order: quantity, per-order maximum, stock.
 */
export function checkPurchase(product: Product, quantity: number): Either<StoreError, LineCharge> {
  if (!Number.isInteger(quantity) || quantity < 1) {
    return Left(invalidQuantity(quantity));
  }
  if (product.kind === 'limited' && quantity > product.maximum) {
    return Left(maxQuantityExceeded(product, product.maximum));
  }
  if (isStocked(product) && quantity > product.quantity) {
    return Left(insufficientStock(product, product.quantity, quantity));
  }
  return Right({
    productId: product.id,
    productName: product.name,
    quantity,
    unitPrice: product.price,
    promotionName: product.promotion?.name ?? null,
    lineTotal: lineTotal(product, quantity),
  });
}

export function applyPurchase(product: Product, quantity: number): Product {
  return adjustQuantity(product, -quantity);
}

export function purchase(product: Product, quantity: number): Either<StoreError, PurchaseResult> {
  return checkPurchase(product, quantity).map(charge => ({
    product: applyPurchase(product, quantity),
    charge: charge.lineTotal,
  }));
}

// Non-stocked products have no quantity to adjust
export function adjustQuantity(product: Product, change: number): Product {
  if (!isStocked(product) || change === 0) return product;
  return {...product, quantity: product.quantity + change};
}

// ============================================================================
// Validation
// ============================================================================

function validateName(name: string): Either<StoreError, string> {
  const value = name.trim();
  if (!value) {
    return Left(invalidProduct('Product name cannot be empty'));
  }
  return Right(value);
}

function validatePrice(price: number): Either<StoreError, number> {
  if (!Number.isFinite(price)) {
    return Left(invalidProduct('Price must be a finite number'));
  }
  if (price < 0) {
    return Left(invalidProduct('Price cannot be negative'));
  }
  return Right(price);
}

function validateQuantity(quantity: number): Either<StoreError, number> {
  if (!Number.isInteger(quantity)) {
    return Left(invalidProduct('Quantity must be a whole number'));
  }
  if (quantity < 0) {
    return Left(invalidProduct('Quantity cannot be negative'));
  }
  return Right(quantity);
}
