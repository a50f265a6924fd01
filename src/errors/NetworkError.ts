import { AguaIotError } from './AguaIotError';

/**
 * NetworkError
 *
 * Thrown when the platform cannot be reached or a request times out.
 */
export class NetworkError extends AguaIotError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}
