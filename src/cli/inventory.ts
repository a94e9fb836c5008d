/**
 * Opening stock for the demo store, with a promotion on some of the lines.
 */

import {Product, StoreError} from '../domain';
import {makeLimitedProduct, makeNonStockedProduct, makeProduct, setPromotion} from '../pure/products';
import {makePercentDiscount, makeSecondHalfPrice, makeThirdOneFree} from '../pure/promotions';
import {Either} from 'purify-ts';

export function seedInventory(): Either<StoreError, Product[]> {
  const secondHalfPrice = makeSecondHalfPrice('Second Half price!');
  const thirdOneFree = makeThirdOneFree('Third One Free!');

  return makePercentDiscount('30% off!', 30).chain(thirtyPercent =>
    Either.sequence<StoreError, Product>([
      makeProduct('MacBook Air M2', 1450, 100).map(product => setPromotion(product, secondHalfPrice)),
      makeProduct('Bose QuietComfort Earbuds', 250, 500).map(product => setPromotion(product, thirdOneFree)),
      makeProduct('Google Pixel 7', 500, 250),
      makeNonStockedProduct('Windows License', 125).map(product => setPromotion(product, thirtyPercent)),
      makeLimitedProduct('Shipping', 10, 250, 1),
    ])
  );
}
