import { BadRequestException, ConflictException } from '@nestjs/common';

export class CircularBundleError extends ConflictException {
  constructor(
    readonly bundleId: number,
    readonly componentId: number,
    readonly path: number[],
  ) {
    super({
      message: `Adding product ${componentId} to bundle ${bundleId} would create a cycle (${path.join(' -> ')}).`,
      error: 'Conflict',
      errorCode: 'CIRCULAR_BUNDLE',
      bundleId,
      componentId,
      path,
    });
  }
}

export class DuplicateBundleComponentError extends ConflictException {
  constructor(readonly bundleId: number, readonly componentId: number) {
    super({
      message: `Product ${componentId} is already a component of bundle ${bundleId}.`,
      error: 'Conflict',
      errorCode: 'DUPLICATE_BUNDLE_COMPONENT',
      bundleId,
      componentId,
    });
  }
}

export class BundleDepthExceededError extends BadRequestException {
  constructor(
    readonly bundleId: number,
    readonly componentId: number,
    readonly maxDepth: number,
  ) {
    super({
      message: `Product ${componentId} nests more than ${maxDepth} levels of components below bundle ${bundleId}.`,
      error: 'Bad Request',
      errorCode: 'BUNDLE_DEPTH_EXCEEDED',
      bundleId,
      componentId,
      maxDepth,
    });
  }
}
