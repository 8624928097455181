import { ConflictException } from '@nestjs/common';

export class AmbiguousPreferredSupplierError extends ConflictException {
  constructor(readonly productId: number, readonly supplierIds: number[]) {
    super({
      message: `Product ${productId} has more than one preferred supplier.`,
      error: 'Conflict',
      errorCode: 'AMBIGUOUS_PREFERRED_SUPPLIER',
      productId,
      supplierIds,
    });
  }
}
