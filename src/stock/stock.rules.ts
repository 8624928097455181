import { LEDGER_ENTRY_TYPES } from '../database/schema';
import { InvalidQuantityChangeError } from './stock.errors';
import { LedgerEntryType } from './stock.types';

/** Largest value the int4 quantity columns hold. */
export const MAX_STOCK_QUANTITY = 2_147_483_647;

const DIRECTION: Record<LedgerEntryType, 'in' | 'out' | 'either'> = {
  purchase: 'in',
  transfer_in: 'in',
  sale: 'out',
  transfer_out: 'out',
  adjustment: 'either',
};

export function isLedgerEntryType(value: unknown): value is LedgerEntryType {
  return LEDGER_ENTRY_TYPES.some((type) => type === value);
}

export function assertQuantityChange(type: LedgerEntryType, change: number) {
  if (!Number.isSafeInteger(change) || change === 0) {
    throw new InvalidQuantityChangeError(
      'Quantity change must be a non-zero integer.',
    );
  }
  if (Math.abs(change) > MAX_STOCK_QUANTITY) {
    throw new InvalidQuantityChangeError(
      `Quantity change must not exceed ${MAX_STOCK_QUANTITY} in either direction.`,
    );
  }
  const direction = DIRECTION[type];
  if (direction === 'in' && change < 0) {
    throw new InvalidQuantityChangeError(
      `A ${type} entry must increase stock.`,
    );
  }
  if (direction === 'out' && change > 0) {
    throw new InvalidQuantityChangeError(
      `A ${type} entry must decrease stock.`,
    );
  }
}

export function assertPositiveQuantity(quantity: number, label: string) {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new InvalidQuantityChangeError(`${label} must be a positive integer.`);
  }
  if (quantity > MAX_STOCK_QUANTITY) {
    throw new InvalidQuantityChangeError(
      `${label} must not exceed ${MAX_STOCK_QUANTITY}.`,
    );
  }
}
