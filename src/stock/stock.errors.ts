import { BadRequestException, ConflictException } from '@nestjs/common';

type PairState = {
  productId: number;
  warehouseId: number;
  quantity: number;
  reservedQty: number;
};

export class InsufficientStockError extends ConflictException {
  constructor(
    readonly state: PairState & { quantityChange: number },
  ) {
    super({
      message: `Insufficient stock for product ${state.productId} in warehouse ${state.warehouseId}: quantity ${state.quantity}, reserved ${state.reservedQty}, change ${state.quantityChange}.`,
      error: 'Conflict',
      errorCode: 'INSUFFICIENT_STOCK',
      ...state,
    });
  }
}

export class OverReservationError extends ConflictException {
  constructor(
    message: string,
    readonly state: PairState & { requested: number },
  ) {
    super({
      message,
      error: 'Conflict',
      errorCode: 'OVER_RESERVATION',
      ...state,
    });
  }
}

/** The caller is expected to re-run the whole operation. */
export class ConcurrentModificationError extends ConflictException {
  constructor(message = 'Stock level was modified concurrently.') {
    super({
      message,
      error: 'Conflict',
      errorCode: 'CONCURRENT_MODIFICATION',
    });
  }
}

export class InvalidQuantityChangeError extends BadRequestException {
  constructor(message: string) {
    super({
      message,
      error: 'Bad Request',
      errorCode: 'INVALID_QUANTITY_CHANGE',
    });
  }
}

export class BundleStockIsDerivedError extends BadRequestException {
  constructor(readonly productId: number) {
    super({
      message: `Product ${productId} is a bundle; its stock is derived from its components.`,
      error: 'Bad Request',
      errorCode: 'BUNDLE_STOCK_IS_DERIVED',
    });
  }
}
