/**
 * Error Types
 *
 * Custom error classes for the Agua IoT client.
 */

export { AguaIotError } from './AguaIotError';
export { AuthenticationError } from './AuthenticationError';
export { NetworkError } from './NetworkError';
export { ServiceError } from './ServiceError';
export { ValidationError } from './ValidationError';
