/**
 * Device snapshots
 *
 * Immutable view of one heating device at the time of its last read.
 */

import type { Logger } from '../logger';
import {
  REGISTER_KEYS,
  Reading,
  RegisterMap,
  UNKNOWN,
  isKnown,
  readRegister,
  readRegisterText,
} from '../helpers/registers';
import type { DeviceListEntry } from './response';

export type DevicePhase = 'unloaded' | 'loaded' | 'refreshing';

export interface Device {
  readonly id: number | string;
  /** Identifier, unique within a connection */
  readonly idDevice: string;
  readonly idProduct: string;
  readonly productSerial: string;
  readonly name: string;
  readonly productName: string;
  readonly online: boolean;
  readonly registersMapId: string;

  readonly airTemperature: Reading;
  readonly targetTemperature: Reading;
  readonly minTemperature: Reading;
  readonly maxTemperature: Reading;
  readonly gasTemperature: Reading;

  /** Current operating mode, one of `modes`, or unknown */
  readonly mode: string;
  readonly modes: readonly string[];

  readonly power: boolean;
  readonly powerLevel: Reading;
  readonly minPowerLevel: Reading;
  readonly maxPowerLevel: Reading;
  readonly realPower: Reading;

  readonly status: Reading;
  readonly statusText: string;
  readonly alarms: string;

  readonly lastRefreshed: Date;
}

const STATUS_TEXT: Record<number, string> = {
  0: 'OFF',
  1: 'START',
  2: 'LOAD PELLETS',
  3: 'FLAME LIGHT',
  4: 'ON',
  5: 'CLEANING FIRE-POT',
  6: 'CLEANING FINAL',
  7: 'ECO-STOP',
  9: 'NO PELLETS',
};

export function translateStatus(status: Reading): string {
  if (!isKnown(status)) {
    return UNKNOWN;
  }
  return STATUS_TEXT[status] ?? '?';
}

function readMode(registers: RegisterMap, buffer: Map<number, number>, log?: Logger): { mode: string; modes: string[] } {
  const register = registers.get(REGISTER_KEYS.mode);
  if (!register) {
    return { mode: UNKNOWN, modes: [] };
  }

  const modes = register.encodings.map((encoding) => encoding.description.toLowerCase());
  const value = readRegister(registers, REGISTER_KEYS.mode, buffer, log);
  const current = register.encodings.find((encoding) => encoding.value === value);
  return { mode: current ? current.description.toLowerCase() : UNKNOWN, modes };
}

export function toDevice(
  entry: DeviceListEntry,
  registersMapId: string,
  registers: RegisterMap,
  buffer: Map<number, number>,
  now: number,
  log?: Logger,
): Device {
  const read = (key: string): Reading => readRegister(registers, key, buffer, log);
  const range = (key: string): { min: Reading; max: Reading } => {
    const register = registers.get(key);
    return { min: register?.min ?? UNKNOWN, max: register?.max ?? UNKNOWN };
  };

  const status = read(REGISTER_KEYS.status);
  const temperatureRange = range(REGISTER_KEYS.targetTemperature);
  const powerRange = range(REGISTER_KEYS.powerLevel);

  return {
    id: entry.id,
    idDevice: entry.id_device,
    idProduct: entry.id_product,
    productSerial: entry.product_serial,
    name: entry.name,
    productName: entry.name_product,
    online: entry.is_online,
    registersMapId,

    airTemperature: read(REGISTER_KEYS.airTemperature),
    targetTemperature: read(REGISTER_KEYS.targetTemperature),
    minTemperature: temperatureRange.min,
    maxTemperature: temperatureRange.max,
    gasTemperature: read(REGISTER_KEYS.gasTemperature),

    ...readMode(registers, buffer, log),

    power: isKnown(status) && status !== 0,
    powerLevel: read(REGISTER_KEYS.powerLevel),
    minPowerLevel: powerRange.min,
    maxPowerLevel: powerRange.max,
    realPower: read(REGISTER_KEYS.realPower),

    status,
    statusText: translateStatus(status),
    alarms: readRegisterText(registers, REGISTER_KEYS.alarms, buffer, log) ?? UNKNOWN,

    lastRefreshed: new Date(now),
  };
}
