import { AguaIotError } from './AguaIotError';

/**
 * ServiceError
 *
 * Thrown when the platform answers with an unexpected status or body.
 * `payloadShape` summarizes the offending body for diagnosis.
 */
export class ServiceError extends AguaIotError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly payloadShape?: string,
  ) {
    super(message);
    this.name = 'ServiceError';
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}
