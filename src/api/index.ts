/**
 * Agua IoT API Module
 *
 * Re-exports the session, transport and registry classes.
 */

export { AguaIotApi } from './AguaIotApi';
export type { ApiResponse } from './AguaIotApi';

export { Session } from './Session';
export { SessionManager } from './SessionManager';

export { DeviceRegistry } from './DeviceRegistry';
export { translateStatus } from './device';
export type { Device, DevicePhase } from './device';

export { describeShape } from './response';
export type { DeviceListEntry, JobStatusResponse } from './response';
