import type { ProductId, Quantity } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

// Not found error for missing records (404)
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND_ERROR';
  readonly statusCode = 404;

  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly identifier: string,
    details?: Record<string, unknown>
  ) {
    super(message, { resourceType, identifier, ...details });
  }

  static product(id: ProductId): NotFoundError {
    return new NotFoundError(`A product with id=${id} was not found`, 'Product', String(id), { id });
  }

  static productUpdate(id: ProductId): NotFoundError {
    return new NotFoundError(
      `Couldn't update a product with id=${id}. Product not found`,
      'Product',
      String(id),
      { id }
    );
  }

  static productRestock(id: ProductId): NotFoundError {
    return new NotFoundError(
      `Couldn't add quantity to product with id=${id}. Product not found`,
      'Product',
      String(id),
      { id }
    );
  }

  static productOffload(id: ProductId): NotFoundError {
    return new NotFoundError(
      `Couldn't offload a product with id=${id}. Product not found`,
      'Product',
      String(id),
      { id }
    );
  }

  static productRemoval(id: ProductId): NotFoundError {
    return new NotFoundError(
      `Couldn't delete a product with id=${id}. Product not found`,
      'Product',
      String(id),
      { id }
    );
  }
}

// Payload or invariant violation (400)
export class InvalidOperationError extends DomainError {
  readonly code = 'INVALID_OPERATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }

  static emptyName(name: string): InvalidOperationError {
    return new InvalidOperationError('Product name cannot be empty.', 'name', name);
  }

  static invalidQuantity(quantity: number): InvalidOperationError {
    return new InvalidOperationError(
      `Invalid quantity: ${quantity}. Quantity must be a non-negative integer.`,
      'quantity',
      quantity
    );
  }

  static nonPositiveQuantity(quantity: Quantity): InvalidOperationError {
    return new InvalidOperationError('Product quantity must be greater than zero.', 'quantity', quantity);
  }

  static invalidAmount(amount: number): InvalidOperationError {
    return new InvalidOperationError(
      `Invalid amount: ${amount}. Amount must be a non-negative integer.`,
      'amount',
      amount
    );
  }

  static nonPositiveAmount(amount: Quantity): InvalidOperationError {
    return new InvalidOperationError('Stock amount must be greater than zero.', 'amount', amount);
  }

  static emptyStock(id: ProductId): InvalidOperationError {
    return new InvalidOperationError(
      `Product with id=${id} cannot be offloaded because the quantity is 0`,
      'quantity',
      0,
      { id }
    );
  }

  static insufficientStock(id: ProductId, available: Quantity, requested: Quantity): InvalidOperationError {
    return new InvalidOperationError(
      `Cannot offload more than available quantity. Available: ${available}, Trying to offload: ${requested}`,
      'amount',
      requested,
      { id, available, requested }
    );
  }
}

// Unrecoverable storage failure; aborts the operation and never reaches callers verbatim
export class StoreFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreFailureError';
  }
}

export class RecordTooLargeError extends StoreFailureError {
  public readonly id: ProductId;
  public readonly size: number;
  public readonly limit: number;

  constructor(id: ProductId, size: number, limit: number) {
    super(`Encoded product id=${id} is ${size} bytes, exceeding the ${limit} byte limit`);
    this.name = 'RecordTooLargeError';
    this.id = id;
    this.size = size;
    this.limit = limit;
  }
}

export class RecordDecodeError extends StoreFailureError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordDecodeError';
  }
}

export class QuantityOverflowError extends StoreFailureError {
  public readonly id: ProductId;
  public readonly quantity: Quantity;
  public readonly amount: Quantity;

  constructor(id: ProductId, quantity: Quantity, amount: Quantity) {
    super(`Adding ${amount} to product id=${id} with quantity ${quantity} overflows the stock counter`);
    this.name = 'QuantityOverflowError';
    this.id = id;
    this.quantity = quantity;
    this.amount = amount;
  }
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError) {
    return {
      success: false as const,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
