import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export type ErrorDetails = Record<string, unknown>;

/** Malformed date/time input, or a window whose start is not before its end. */
export class ValidationError extends BadRequestException {
  constructor(message: string, details: ErrorDetails = {}) {
    super({ error: 'validation_error', message, ...details });
  }
}

/** Slot already booked, or a reschedule target that was taken. */
export class ConflictError extends ConflictException {
  constructor(message: string, details: ErrorDetails = {}) {
    super({ error: 'scheduling_conflict', message, ...details });
  }
}

export class NotFoundError extends NotFoundException {
  constructor(message: string, details: ErrorDetails = {}) {
    super({ error: 'not_found', message, ...details });
  }
}

/** Illegal transition, or an edit aimed at a past or booked slot. */
export class StateError extends UnprocessableEntityException {
  constructor(message: string, details: ErrorDetails = {}) {
    super({ error: 'invalid_state', message, ...details });
  }
}

export class ExternalServiceError extends BadGatewayException {
  constructor(message: string, details: ErrorDetails = {}) {
    super({ error: 'external_service_error', message, ...details });
  }
}
