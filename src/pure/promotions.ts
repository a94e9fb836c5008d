/**
 * PROMOTIONS
 *
 * A promotion is a pure pricing rule over (unit price, quantity). It never
 * looks at stock, so it can be applied as often as needed.
 */

import {PercentDiscount, Promotion, SecondHalfPrice, StoreError, ThirdOneFree} from '../domain';
import {invalidPromotionParameter} from './errors';
import {Either, Left, Right} from 'purify-ts';

// ============================================================================
// Construction
// ============================================================================

export function makePercentDiscount(name: string, percent: number): Either<StoreError, PercentDiscount> {
  if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
    return Left(invalidPromotionParameter('Discount percentage must be between 0 and 100'));
  }
  return Right({kind: 'percentDiscount', name, percent});
}

export function makeSecondHalfPrice(name: string): SecondHalfPrice {
  return {kind: 'secondHalfPrice', name};
}

export function makeThirdOneFree(name: string): ThirdOneFree {
  return {kind: 'thirdOneFree', name};
}

// ============================================================================
// Pricing
// ============================================================================

/**
 * Total charge for `quantity` units at `unitPrice` under the promotion.
 * Callers guarantee `quantity >= 1`; zero-quantity lines are rejected upstream.
 */
export function applyPromotion(
  promotion: Promotion,
  unitPrice: number,
  quantity: number
): number {
  switch (promotion.kind) {
    case 'percentDiscount':
      return unitPrice * quantity * (1 - promotion.percent / 100);
    case 'secondHalfPrice': {
      const pairs = Math.floor(quantity / 2);
      const remainder = quantity % 2;
      return pairs * (unitPrice + unitPrice * 0.5) + remainder * unitPrice;
    }
    case 'thirdOneFree': {
      const groups = Math.floor(quantity / 3);
      const remainder = quantity % 3;
      return groups * 2 * unitPrice + remainder * unitPrice;
    }
  }
}
