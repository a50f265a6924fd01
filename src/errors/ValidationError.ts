import { AguaIotError } from './AguaIotError';

/**
 * ValidationError
 *
 * Thrown for a caller-supplied value that is out of range or unrecognized.
 * Nothing is sent to the platform.
 */
export class ValidationError extends AguaIotError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
