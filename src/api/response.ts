/**
 * API Response Types
 *
 * Shapes returned by the Agua IoT platform, and the guards that turn an
 * untyped JSON body into them. Anything that does not match surfaces as a
 * ServiceError carrying a summary of the payload shape.
 */

import { ServiceError } from '../errors';

export type JsonObject = Record<string, unknown>;

export interface LoginResponse {
  token: string;
  refresh_token?: string;
}

export interface RefreshTokenResponse {
  token: string;
}

/**
 * One entry of the `/deviceList` answer
 */
export interface DeviceListEntry {
  id: number | string;
  id_device: string;
  id_product: string;
  product_serial: string;
  name: string;
  is_online: boolean;
  name_product: string;
}

export interface RawRegistersMap {
  id: string;
  registers: unknown[];
}

export interface JobStatusResponse {
  jobAnswerStatus: string;
  jobAnswerData?: JsonObject;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Short description of a JSON value for logs and errors, e.g.
 * `{device: array(2), status: string}`.
 */
export function describeShape(value: unknown, depth = 1): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `array(${value.length})`;
  }
  if (isJsonObject(value)) {
    if (depth <= 0) {
      return 'object';
    }
    const fields = Object.entries(value).map(([key, field]) => `${key}: ${describeShape(field, depth - 1)}`);
    return `{${fields.join(', ')}}`;
  }
  return typeof value;
}

function unexpected(what: string, body: unknown, status?: number): ServiceError {
  return new ServiceError(`Unexpected ${what} response`, status, describeShape(body));
}

/**
 * Coerce an identifier the platform sends as either number or string
 */
function asIdentifier(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function parseLoginResponse(body: unknown): LoginResponse {
  if (!isJsonObject(body) || typeof body.token !== 'string' || body.token.length === 0) {
    throw unexpected('login', body);
  }
  return {
    token: body.token,
    refresh_token: typeof body.refresh_token === 'string' ? body.refresh_token : undefined,
  };
}

export function parseRefreshTokenResponse(body: unknown): RefreshTokenResponse {
  if (!isJsonObject(body) || typeof body.token !== 'string' || body.token.length === 0) {
    throw unexpected('token refresh', body);
  }
  return { token: body.token };
}

/**
 * Parse the device list. Identifiers are required; descriptive fields fall
 * back to empty values.
 */
export function parseDeviceList(body: unknown): DeviceListEntry[] {
  if (!isJsonObject(body) || !Array.isArray(body.device)) {
    throw unexpected('device list', body);
  }

  return body.device.map((entry: unknown): DeviceListEntry => {
    if (!isJsonObject(entry)) {
      throw unexpected('device list', body);
    }
    const idDevice = asIdentifier(entry.id_device);
    const idProduct = asIdentifier(entry.id_product);
    if (idDevice === undefined || idProduct === undefined) {
      throw unexpected('device list', body);
    }
    const id = typeof entry.id === 'number' || typeof entry.id === 'string' ? entry.id : idDevice;

    return {
      id,
      id_device: idDevice,
      id_product: idProduct,
      product_serial: typeof entry.product_serial === 'string' ? entry.product_serial : '',
      name: typeof entry.name === 'string' ? entry.name : idDevice,
      is_online: entry.is_online === true || entry.is_online === 1 || entry.is_online === 'true',
      name_product: typeof entry.name_product === 'string' ? entry.name_product : '',
    };
  });
}

export function parseRegistersMapId(body: unknown): string {
  if (isJsonObject(body) && Array.isArray(body.device_info) && body.device_info.length > 0) {
    const info: unknown = body.device_info[0];
    const id = isJsonObject(info) ? asIdentifier(info.id_registers_map) : undefined;
    if (id !== undefined) {
      return id;
    }
  }
  throw unexpected('device info', body);
}

/**
 * Pick the registers map with the given id out of `/deviceGetRegistersMap`
 */
export function findRegistersMap(body: unknown, registersMapId: string): RawRegistersMap {
  const container = isJsonObject(body) ? body.device_registers_map : undefined;
  const maps = isJsonObject(container) ? container.registers_map : undefined;
  if (!Array.isArray(maps)) {
    throw unexpected('registers map', body);
  }

  for (const map of maps) {
    if (isJsonObject(map) && asIdentifier(map.id) === registersMapId && Array.isArray(map.registers)) {
      return { id: registersMapId, registers: map.registers };
    }
  }

  throw new ServiceError(`Registers map ${registersMapId} not found`, undefined, describeShape(body));
}

export function parseRequestId(body: unknown, what: string): string {
  const id = isJsonObject(body) ? asIdentifier(body.idRequest) : undefined;
  if (id === undefined) {
    throw unexpected(what, body);
  }
  return id;
}

export function parseJobStatus(body: unknown): JobStatusResponse {
  if (!isJsonObject(body) || typeof body.jobAnswerStatus !== 'string') {
    throw unexpected('job status', body);
  }
  return {
    jobAnswerStatus: body.jobAnswerStatus,
    jobAnswerData: isJsonObject(body.jobAnswerData) ? body.jobAnswerData : undefined,
  };
}

/**
 * Pair the parallel `Items` (offsets) and `Values` arrays of a buffer reading.
 * Entries that are not numeric are left out; the readings that depend on them
 * become unknown.
 */
export function parseBufferValues(data: JsonObject | undefined): Map<number, number> {
  const items = data?.Items;
  const values = data?.Values;
  if (!Array.isArray(items) || !Array.isArray(values)) {
    throw unexpected('buffer reading', data);
  }

  const buffer = new Map<number, number>();
  items.forEach((item: unknown, index) => {
    const offset = Number(item);
    const value: unknown = values[index];
    if (Number.isInteger(offset) && typeof value === 'number' && Number.isFinite(value)) {
      buffer.set(offset, value);
    }
  });
  return buffer;
}
