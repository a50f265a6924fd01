import { AguaIotError } from './AguaIotError';

/**
 * AuthenticationError
 *
 * Thrown when the platform rejects the credentials, or when an authorization
 * failure persists after one re-authentication. Not retried automatically.
 */
export class AuthenticationError extends AguaIotError {
  constructor(message = 'Authentication failed, please check credentials') {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}
