// Module product types

import {LineCharge, Product} from "../domain";

export type InventoryUpdate = {
    readonly productId: string;
    readonly quantityChange: number;
};

export type PurchaseResult = {
    readonly product: Product;
    readonly charge: number;
};

export type OrderSimulation = {
    readonly stock: ReadonlyMap<string, Product>;
    readonly charges: LineCharge[];
};
