/**
 * STORE - owns the catalog
 *
 * The only mutable object in the core. Everything it decides is delegated to
 * the pure functions in ../pure; the store just swaps in the new snapshots.
 */
import {OrderLine, OrderReceipt, Product, StoreError} from '../domain';
import {
  applyInventoryUpdates,
  calculateInventoryUpdates,
  calculateTotalQuantity,
  findProduct,
  planOrder,
  toOrderReceipt,
} from '../pure/businessLogic';
import {isActive, setQuantity} from '../pure/products';
import {productNotFound} from '../pure/errors';
import {Either, Left, Maybe} from 'purify-ts';

export class Store {
  private products: Product[];

  constructor(products: readonly Product[] = []) {
    this.products = [...products];
  }

  addProduct(product: Product): void {
    if (!this.contains(product)) {
      this.products = [...this.products, product];
    }
  }

  removeProduct(product: Product): boolean {
    const remaining = this.products.filter(entry => entry.id !== product.id);
    const removed = remaining.length !== this.products.length;
    this.products = remaining;
    return removed;
  }

  listProducts(): Product[] {
    return [...this.products];
  }

  listActiveProducts(): Product[] {
    return this.products.filter(isActive);
  }

  // Non-stocked products have no quantity and are left out of the total
  totalQuantity(): number {
    return calculateTotalQuantity(this.products);
  }

  contains(product: Product): boolean {
    return findProduct(this.products, product.id).isJust();
  }

  find(productId: string): Maybe<Product> {
    return findProduct(this.products, productId);
  }

  restock(product: Product, quantity: number): Either<StoreError, Product> {
    return this.find(product.id).caseOf<Either<StoreError, Product>>({
      Nothing: () => Left(productNotFound(product.name)),
      Just: current => {
        const restocked = setQuantity(current, quantity);
        restocked.ifRight(updated => this.replace(updated));
        return restocked;
      },
    });
  }

  /**
   * A new store listing this catalog followed by the other one. Neither
   * operand changes, and orders against the result do not reach back into them.
   */
  combine(other: Store): Store {
    return new Store([...this.products, ...other.products]);
  }

  /**
   * Fulfil an order as a whole or not at all.
   *
   * Validation runs against a read-only view of the catalog; stock is only
   * written once every line has passed.
   * @return either the first failing line's error or the order receipt
   */
  order(lines: readonly OrderLine[]): Either<StoreError, OrderReceipt> {
    const plan = planOrder(this.products, lines);
    plan.ifRight(charges => {
      this.products = applyInventoryUpdates(this.products, calculateInventoryUpdates(charges));
    });
    return plan.map(toOrderReceipt);
  }

  private replace(updated: Product): void {
    this.products = this.products.map(entry => (entry.id === updated.id ? updated : entry));
  }
}
