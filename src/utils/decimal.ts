import { Decimal as DecimalBase } from 'decimal.js';

/**
 * Decimal constructor for every quantity, price and total in the project.
 * 64 significant digits hold the product of a quantity with two provider
 * floats (about 17 digits each) without rounding.
 */
export const Decimal = DecimalBase.clone({ precision: 64 });
export type Decimal = DecimalBase;
