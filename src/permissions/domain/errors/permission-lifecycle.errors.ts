import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';

/**
 * The permission is not in a state that allows the requested transition
 */
export class InvalidStateError extends ConflictException {}

/**
 * Input rejected before any state was touched
 */
export class InvalidArgumentError extends BadRequestException {}

/**
 * Unknown permission id or principal
 */
export class NotFoundError extends NotFoundException {}
