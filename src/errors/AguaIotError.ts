/**
 * AguaIotError
 *
 * Base class of every error raised by the client.
 */
export class AguaIotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AguaIotError';
    Object.setPrototypeOf(this, AguaIotError.prototype);
  }
}
