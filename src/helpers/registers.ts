/**
 * Device registers
 *
 * A device exposes its state as raw values at buffer offsets. The registers
 * map names each offset (`temp_air_get`, `power_set`, ...) and says how to
 * convert it to a reading and back.
 */

import type { Logger } from '../logger';
import type { RawRegistersMap } from '../api/response';
import { isJsonObject } from '../api/response';
import { ServiceError, ValidationError } from '../errors';
import { applyFormatString, evaluateFormula } from './formula';

/**
 * A numeric value read from the device, or `'unknown'` when the device sent
 * nothing usable for it.
 */
export type Reading = number | 'unknown';

export const UNKNOWN = 'unknown';

export const REGISTER_KEYS = {
  airTemperature: 'temp_air_get',
  targetTemperature: 'temp_air_set',
  gasTemperature: 'temp_gas_flue_get',
  status: 'status_get',
  statusManaged: 'status_managed_get',
  powerLevel: 'power_set',
  realPower: 'real_power_get',
  alarms: 'alarms_get',
  mode: 'mode_set',
} as const;

export interface RegisterEncoding {
  description: string;
  value: number;
}

export interface Register {
  key: string;
  offset: number;
  formula: string;
  formulaInverse: string;
  formatString: string;
  min: Reading;
  max: Reading;
  mask: number;
  encodings: RegisterEncoding[];
}

export type RegisterMap = Map<string, Register>;

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function isKnown(reading: Reading): reading is number {
  return reading !== UNKNOWN;
}

/**
 * Build a register map from the raw registers. Registers without a key,
 * offset or formula are skipped; the readings that use them are unknown.
 * Only English encodings are kept.
 */
export function parseRegisters(raw: RawRegistersMap, log?: Logger): RegisterMap {
  const registers: RegisterMap = new Map();

  for (const entry of raw.registers) {
    if (!isJsonObject(entry) || typeof entry.reg_key !== 'string') {
      log?.debug('[Registers] Skipping register without key in map', raw.id);
      continue;
    }

    const offset = toNumber(entry.offset);
    if (offset === undefined || typeof entry.formula !== 'string') {
      log?.debug('[Registers] Skipping malformed register', entry.reg_key);
      continue;
    }

    const encodings: RegisterEncoding[] = [];
    if (Array.isArray(entry.enc_val)) {
      for (const encoding of entry.enc_val) {
        if (!isJsonObject(encoding) || encoding.lang !== 'ENG' || typeof encoding.description !== 'string') {
          continue;
        }
        const value = toNumber(encoding.value);
        if (value !== undefined) {
          encodings.push({ description: encoding.description, value });
        }
      }
    }

    registers.set(entry.reg_key, {
      key: entry.reg_key,
      offset,
      formula: entry.formula,
      formulaInverse: typeof entry.formula_inverse === 'string' ? entry.formula_inverse : '#',
      formatString: typeof entry.format_string === 'string' ? entry.format_string : '{0}',
      min: toNumber(entry.set_min) ?? UNKNOWN,
      max: toNumber(entry.set_max) ?? UNKNOWN,
      mask: toNumber(entry.mask) ?? 0,
      encodings,
    });
  }

  return registers;
}

/**
 * Formatted text of a register, before it is parsed as a number
 */
export function readRegisterText(
  registers: RegisterMap,
  key: string,
  buffer: Map<number, number>,
  log?: Logger,
): string | undefined {
  const register = registers.get(key);
  const raw = register ? buffer.get(register.offset) : undefined;
  if (!register || raw === undefined) {
    return undefined;
  }

  try {
    return applyFormatString(register.formatString, evaluateFormula(register.formula, raw));
  } catch (error) {
    if (error instanceof ServiceError) {
      log?.debug(`[Registers] Cannot read ${key}:`, error.message);
      return undefined;
    }
    throw error;
  }
}

export function readRegister(
  registers: RegisterMap,
  key: string,
  buffer: Map<number, number>,
  log?: Logger,
): Reading {
  const text = readRegisterText(registers, key, buffer, log);
  const value = text === undefined ? undefined : toNumber(text);
  return value ?? UNKNOWN;
}

/**
 * Require a register the device must advertise for a write
 */
export function requireRegister(registers: RegisterMap, key: string): Register {
  const register = registers.get(key);
  if (!register) {
    throw new ValidationError(`Device does not advertise register ${key}`);
  }
  return register;
}

/**
 * Convert a caller value to the raw value written to the device.
 * Fails with a ValidationError when the value is outside the register's
 * advertised range.
 */
export function encodeRegisterValue(register: Register, value: number): number {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Value for ${register.key} must be a finite number`);
  }
  if (!isKnown(register.min) || !isKnown(register.max)) {
    throw new ValidationError(`Device does not advertise a range for ${register.key}`);
  }
  if (value < register.min || value > register.max) {
    throw new ValidationError(`Value must be between ${register.min} and ${register.max}`);
  }

  const formatted = applyFormatString(register.formatString, evaluateFormula(register.formulaInverse, value));
  const raw = Number(formatted);
  if (!Number.isFinite(raw)) {
    throw new ServiceError(`Register ${register.key} does not encode ${value}`);
  }
  return Math.trunc(raw);
}

/**
 * Raw value of an encoding, matched case-insensitively on its description
 */
export function findEncoding(register: Register, description: string): RegisterEncoding | undefined {
  const wanted = description.toLowerCase();
  return register.encodings.find((encoding) => encoding.description.toLowerCase() === wanted);
}
