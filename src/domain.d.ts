// Domain types shared across the application

export type PercentDiscount = {
  readonly kind: 'percentDiscount';
  readonly name: string;
  readonly percent: number;
};

export type SecondHalfPrice = {
  readonly kind: 'secondHalfPrice';
  readonly name: string;
};

export type ThirdOneFree = {
  readonly kind: 'thirdOneFree';
  readonly name: string;
};

export type Promotion = PercentDiscount | SecondHalfPrice | ThirdOneFree;

type CatalogEntry = {
  readonly id: string;
  readonly name: string;
  readonly price: number;
  readonly promotion: Promotion | null;
};

export type StockedProduct = CatalogEntry & {
  readonly kind: 'stocked';
  readonly quantity: number;
};

export type NonStockedProduct = CatalogEntry & {
  readonly kind: 'nonStocked';
};

export type LimitedProduct = CatalogEntry & {
  readonly kind: 'limited';
  readonly quantity: number;
  readonly maximum: number;
};

export type Product = StockedProduct | NonStockedProduct | LimitedProduct;

export type OrderLine = {
  readonly product: Product;
  readonly quantity: number;
};

export type StoreErrorKind =
  | 'InvalidQuantity'
  | 'InsufficientStock'
  | 'MaxQuantityExceeded'
  | 'ProductNotFound'
  | 'InvalidPromotionParameter'
  | 'InvalidProduct'
  | 'NotApplicable';

export type StoreError = {
  readonly kind: StoreErrorKind;
  readonly message: string;
};

export type OrderReceipt = {
  readonly lines: LineCharge[];
  readonly itemCount: number;
  readonly total: number;
};

export type LineCharge = {
  readonly productId: string;
  readonly productName: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly promotionName: string | null;
  readonly lineTotal: number;
};
