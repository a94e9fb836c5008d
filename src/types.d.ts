// Non domain types

import {OrderLine, StoreError} from "./domain";

export type MenuChoice = 'list' | 'total' | 'order' | 'quit';

export type OrderEntry =
    | { readonly kind: 'done' }
    | { readonly kind: 'line'; readonly line: OrderLine };

export type EntryProblem =
    | { readonly kind: 'malformed'; readonly input: string }
    | { readonly kind: 'rejected'; readonly error: StoreError };
