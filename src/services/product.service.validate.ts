import { MAX_QUANTITY, type ProductPayload, type StockPayload } from '../core/types';
import { InvalidOperationError } from '../core/errors';

function isQuantity(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_QUANTITY;
}

// Shared by creation and update
export function validateProductPayload(payload: ProductPayload): void {
  if (payload.name.trim().length === 0) {
    throw InvalidOperationError.emptyName(payload.name);
  }
  if (!isQuantity(payload.quantity)) {
    throw InvalidOperationError.invalidQuantity(payload.quantity);
  }
  if (payload.quantity === 0) {
    throw InvalidOperationError.nonPositiveQuantity(payload.quantity);
  }
}

export function validateStockPayload(payload: StockPayload): void {
  if (!isQuantity(payload.amount)) {
    throw InvalidOperationError.invalidAmount(payload.amount);
  }
  if (payload.amount === 0) {
    throw InvalidOperationError.nonPositiveAmount(payload.amount);
  }
}
