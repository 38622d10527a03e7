import { describe, it, expect } from 'vitest';
import {
  DomainError,
  NotFoundError,
  InvalidOperationError,
  StoreFailureError,
  RecordTooLargeError,
  RecordDecodeError,
  QuantityOverflowError,
  ErrorFactory,
} from '../../src/core/errors';

describe('Core Errors', () => {
  describe('DomainError', () => {
    it('should create domain error with timestamp', () => {
      class TestError extends DomainError {
        readonly code = 'TEST_ERROR';
        readonly statusCode = 400;
      }

      const error = new TestError('Test message', { field: 'test' });
      expect(error.message).toBe('Test message');
      expect(error.name).toBe('TestError');
      expect(error.details).toEqual({ field: 'test' });
      expect(new Date(error.timestamp).toISOString()).toBe(error.timestamp);
    });
  });

  describe('NotFoundError', () => {
    it('should describe a missing product lookup', () => {
      const error = NotFoundError.product(999);
      expect(error).toBeInstanceOf(DomainError);
      expect(error.message).toBe('A product with id=999 was not found');
      expect(error.code).toBe('NOT_FOUND_ERROR');
      expect(error.statusCode).toBe(404);
      expect(error.resourceType).toBe('Product');
      expect(error.identifier).toBe('999');
      expect(error.details).toEqual({ resourceType: 'Product', identifier: '999', id: 999 });
    });

    it('should name the operation that missed', () => {
      expect(NotFoundError.productUpdate(7).message).toBe("Couldn't update a product with id=7. Product not found");
      expect(NotFoundError.productRestock(7).message).toBe("Couldn't add quantity to product with id=7. Product not found");
      expect(NotFoundError.productOffload(7).message).toBe("Couldn't offload a product with id=7. Product not found");
      expect(NotFoundError.productRemoval(7).message).toBe("Couldn't delete a product with id=7. Product not found");
    });
  });

  describe('InvalidOperationError', () => {
    it('should carry field and value', () => {
      const error = InvalidOperationError.emptyName('   ');
      expect(error.code).toBe('INVALID_OPERATION_ERROR');
      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Product name cannot be empty.');
      expect(error.field).toBe('name');
      expect(error.value).toBe('   ');
    });

    it('should report available and requested amounts', () => {
      const error = InvalidOperationError.insufficientStock(1, 10, 15);
      expect(error.message).toBe('Cannot offload more than available quantity. Available: 10, Trying to offload: 15');
      expect(error.details).toEqual({ field: 'amount', value: 15, id: 1, available: 10, requested: 15 });
    });

    it('should report an empty stock', () => {
      expect(InvalidOperationError.emptyStock(3).message).toBe(
        'Product with id=3 cannot be offloaded because the quantity is 0'
      );
    });

    it('should have fixed messages for zero quantities', () => {
      expect(InvalidOperationError.nonPositiveQuantity(0).message).toBe('Product quantity must be greater than zero.');
      expect(InvalidOperationError.nonPositiveAmount(0).message).toBe('Stock amount must be greater than zero.');
    });
  });

  describe('StoreFailureError family', () => {
    it('should not be domain errors', () => {
      expect(new StoreFailureError('boom')).not.toBeInstanceOf(DomainError);
      expect(new RecordDecodeError('bad bytes')).toBeInstanceOf(StoreFailureError);
    });

    it('should keep the cause', () => {
      const cause = new Error('disk full');
      const error = new StoreFailureError('Cannot increment id counter', { cause });
      expect(error.cause).toBe(cause);
      expect(error.name).toBe('StoreFailureError');
    });

    it('should describe an oversize record', () => {
      const error = new RecordTooLargeError(4, 2048, 1024);
      expect(error).toBeInstanceOf(StoreFailureError);
      expect(error.name).toBe('RecordTooLargeError');
      expect(error.message).toBe('Encoded product id=4 is 2048 bytes, exceeding the 1024 byte limit');
    });

    it('should describe a quantity overflow', () => {
      const error = new QuantityOverflowError(2, 4294967295, 1);
      expect(error.message).toBe('Adding 1 to product id=2 with quantity 4294967295 overflows the stock counter');
      expect(error.quantity).toBe(4294967295);
      expect(error.amount).toBe(1);
    });
  });

  describe('ErrorFactory', () => {
    it('should create a standardized error response', () => {
      const error = NotFoundError.product(5);
      expect(ErrorFactory.createErrorResponse(error)).toEqual({
        success: false,
        error: {
          name: 'NotFoundError',
          message: 'A product with id=5 was not found',
          code: 'NOT_FOUND_ERROR',
          statusCode: 404,
          timestamp: error.timestamp,
          details: { resourceType: 'Product', identifier: '5', id: 5 },
        },
      });
    });
  });
});
