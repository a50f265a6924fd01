/**
 * Client for Eva Calor heating devices on the Agua IoT cloud platform.
 */

export { Connection, connect, generateClientToken } from './Connection';
export { resolveOptions } from './config';
export type { AguaIotOptions, ResolvedOptions } from './config';
export type { Logger } from './logger';

export { AguaIotApi, DeviceRegistry, Session, SessionManager, translateStatus } from './api';
export type { Device, DevicePhase } from './api';

export { UNKNOWN, REGISTER_KEYS, isKnown } from './helpers/registers';
export type { Reading } from './helpers/registers';
export { evaluateFormula, applyFormatString } from './helpers/formula';

export {
  AguaIotError,
  AuthenticationError,
  NetworkError,
  ServiceError,
  ValidationError,
} from './errors';
