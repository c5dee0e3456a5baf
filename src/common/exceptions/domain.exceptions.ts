/**
 * Typed business exceptions.
 *
 * Each one carries a stable `code` in its response body so clients can branch
 * on it without parsing the message.
 *
 * @example
 * ```typescript
 * throw new RecordNotFoundError('Asset', 42);
 * throw new AssetAssignmentConflictError();
 * ```
 */

import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';

// ==================== Not Found Exceptions ====================

export class RecordNotFoundError extends NotFoundException {
  constructor(resource: string, id: number | string) {
    super({
      code: 'record.not_found',
      message: `${resource} with ID ${id} not found`,
    });
  }
}

// ==================== Validation Exceptions ====================

export class AssetAssignmentConflictError extends BadRequestException {
  constructor() {
    super({
      code: 'asset.assignment_conflict',
      message: 'An asset cannot be assigned to both an employee and a location',
    });
  }
}

export class InstalledComponentWithoutAssetError extends BadRequestException {
  constructor() {
    super({
      code: 'component.installed_without_asset',
      message: 'An installed component must have a parent asset',
    });
  }
}

export class InvalidStatusTransitionError extends BadRequestException {
  constructor(resource: string, from: string, to: string) {
    super({
      code: 'status.invalid_transition',
      message: `${resource} cannot move from ${from} to ${to}`,
    });
  }
}

export class AssetNotAssignedError extends BadRequestException {
  constructor(assetTag: string) {
    super({
      code: 'asset.not_assigned',
      message: `Asset ${assetTag} is not assigned`,
    });
  }
}

export class RequisitionItemTargetError extends BadRequestException {
  constructor() {
    super({
      code: 'requisition_item.invalid_target',
      message: 'An item must reference either an asset or a component, not both',
    });
  }
}

export class RequisitionCancelledError extends BadRequestException {
  constructor(requisitionNumber: string) {
    super({
      code: 'requisition.cancelled',
      message: `Cannot add items to cancelled requisition ${requisitionNumber}`,
    });
  }
}

export class RequisitionWithoutItemsError extends BadRequestException {
  constructor(requisitionNumber: string) {
    super({
      code: 'requisition.no_items',
      message: `Requisition ${requisitionNumber} cannot be fulfilled without any items`,
    });
  }
}

// ==================== Conflict Exceptions ====================

export class DuplicateValueError extends ConflictException {
  constructor(detail?: string) {
    super({
      code: 'record.duplicate',
      message: detail ? `Duplicate value: ${detail}` : 'A record with the same unique value already exists',
    });
  }
}
