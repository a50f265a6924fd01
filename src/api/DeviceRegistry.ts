/**
 * Device Registry
 *
 * Loads the heating devices of an account and keeps the last good snapshot
 * of each. Reads and writes run as remote jobs: the platform answers with a
 * request id that is polled until the job completes.
 *
 * Calls on one registry must not overlap; sequence them, or use one
 * connection per caller.
 */

import type { ResolvedOptions } from '../config';
import { AuthenticationError, ServiceError, ValidationError } from '../errors';
import {
  REGISTER_KEYS,
  encodeRegisterValue,
  findEncoding,
  parseRegisters,
  requireRegister,
} from '../helpers/registers';
import type { Register, RegisterMap } from '../helpers/registers';
import {
  API_PATH_DEVICE_BUFFER_READING,
  API_PATH_DEVICE_INFO,
  API_PATH_DEVICE_JOB_STATUS,
  API_PATH_DEVICE_LIST,
  API_PATH_DEVICE_REGISTERS_MAP,
  API_PATH_DEVICE_WRITING,
  REGISTERS_MAP_LAST_UPDATE,
} from '../settings';
import type { AguaIotApi, ApiResponse } from './AguaIotApi';
import { toDevice } from './device';
import type { Device, DevicePhase } from './device';
import type { DeviceListEntry, JsonObject } from './response';
import {
  describeShape,
  findRegistersMap,
  parseBufferValues,
  parseDeviceList,
  parseJobStatus,
  parseRegistersMapId,
  parseRequestId,
} from './response';
import type { Session } from './Session';
import type { SessionManager } from './SessionManager';

interface RegistryEntry {
  listing: DeviceListEntry;
  registersMapId: string;
  registers: RegisterMap;
  device?: Device;
  phase: DevicePhase;
}

export class DeviceRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(
    private readonly api: AguaIotApi,
    private readonly sessionManager: SessionManager,
    private readonly options: ResolvedOptions,
  ) {}

  /**
   * Fetch the device list and the state of every device, in list order.
   * Replaces whatever was loaded before.
   */
  public async load(session: Session): Promise<Device[]> {
    this.options.log?.debug('[DeviceRegistry] Fetching devices');

    const list = await this.webcall(session, 'POST', API_PATH_DEVICE_LIST, {});
    const listing = this.checked(() => parseDeviceList(list));
    const entries = new Map<string, RegistryEntry>();

    for (const item of listing) {
      if (entries.has(item.id_device)) {
        throw new ServiceError(`Duplicate device ${item.id_device} in device list`);
      }
      const info = await this.webcall(session, 'POST', API_PATH_DEVICE_INFO, {
        id_device: item.id_device,
        id_product: item.id_product,
      });
      entries.set(item.id_device, {
        listing: item,
        registersMapId: this.checked(() => parseRegistersMapId(info)),
        registers: new Map(),
        phase: 'unloaded',
      });
    }

    for (const entry of entries.values()) {
      entry.device = await this.readDevice(session, entry);
      entry.phase = 'loaded';
    }

    this.entries.clear();
    for (const [id, entry] of entries) {
      this.entries.set(id, entry);
    }

    this.options.log?.debug(`[DeviceRegistry] Found ${this.entries.size} device(s)`);
    return this.devices();
  }

  /**
   * Loaded snapshots, in list order
   */
  public devices(): Device[] {
    const devices: Device[] = [];
    for (const entry of this.entries.values()) {
      if (entry.device) {
        devices.push(entry.device);
      }
    }
    return devices;
  }

  public get(idDevice: string): Device | undefined {
    return this.entries.get(idDevice)?.device;
  }

  public phase(idDevice: string): DevicePhase {
    return this.entries.get(idDevice)?.phase ?? 'unloaded';
  }

  /**
   * Re-read a device. The previous snapshot stays in place when this fails.
   */
  public async refresh(device: Device, session: Session): Promise<Device> {
    const entry = this.entry(device);
    entry.phase = 'refreshing';
    try {
      entry.device = await this.readDevice(session, entry);
      return entry.device;
    } finally {
      entry.phase = 'loaded';
    }
  }

  public async setPower(device: Device, session: Session, on: boolean): Promise<Device> {
    const entry = this.entry(device);
    const register = requireRegister(entry.registers, REGISTER_KEYS.statusManaged);
    const encoding = findEncoding(register, on ? 'ON' : 'OFF');
    if (!encoding) {
      throw new ValidationError(`Device ${device.name} cannot be turned ${on ? 'on' : 'off'}`);
    }

    await this.write(session, entry, register, encoding.value);
    return this.refresh(device, session);
  }

  public async setTargetTemperature(device: Device, session: Session, value: number): Promise<Device> {
    const entry = this.entry(device);
    const register = requireRegister(entry.registers, REGISTER_KEYS.targetTemperature);

    await this.write(session, entry, register, encodeRegisterValue(register, value));
    return this.refresh(device, session);
  }

  public async setPowerLevel(device: Device, session: Session, level: number): Promise<Device> {
    const entry = this.entry(device);
    const register = requireRegister(entry.registers, REGISTER_KEYS.powerLevel);

    await this.write(session, entry, register, encodeRegisterValue(register, level));
    return this.refresh(device, session);
  }

  public async setMode(device: Device, session: Session, mode: string): Promise<Device> {
    const entry = this.entry(device);
    const register = requireRegister(entry.registers, REGISTER_KEYS.mode);
    const encoding = findEncoding(register, mode);
    if (!encoding) {
      const modes = register.encodings.map((e) => e.description.toLowerCase()).join(', ');
      throw new ValidationError(`Unknown mode "${mode}", expected one of: ${modes}`);
    }

    await this.write(session, entry, register, encoding.value);
    return this.refresh(device, session);
  }

  private entry(device: Device): RegistryEntry {
    const entry = this.entries.get(device.idDevice);
    if (!entry) {
      throw new ValidationError(`Unknown device ${device.idDevice}`);
    }
    return entry;
  }

  private async readDevice(session: Session, entry: RegistryEntry): Promise<Device> {
    const { id_device, id_product } = entry.listing;

    const map = await this.webcall(session, 'POST', API_PATH_DEVICE_REGISTERS_MAP, {
      id_device,
      id_product,
      last_update: REGISTERS_MAP_LAST_UPDATE,
    });
    const registersMap = this.checked(() => findRegistersMap(map, entry.registersMapId));
    const registers = parseRegisters(registersMap, this.options.log);

    const reading = await this.webcall(session, 'POST', API_PATH_DEVICE_BUFFER_READING, {
      id_device,
      id_product,
      BufferId: 1,
    });
    const answer = await this.waitForJob(session, this.checked(() => parseRequestId(reading, 'buffer reading')));
    const buffer = this.checked(() => parseBufferValues(answer));

    entry.registers = registers;
    return toDevice(entry.listing, entry.registersMapId, registers, buffer, this.options.now(), this.options.log);
  }

  private async write(session: Session, entry: RegistryEntry, register: Register, value: number): Promise<void> {
    const { id_device, id_product } = entry.listing;
    this.options.log?.debug(`[DeviceRegistry] Writing ${register.key}=${value} to ${id_device}`);

    const response = await this.webcall(session, 'POST', API_PATH_DEVICE_WRITING, {
      id_device,
      id_product,
      Protocol: 'RWMSmaster',
      BitData: [8],
      Endianess: ['L'],
      Items: [register.offset],
      Masks: [register.mask],
      Values: [value],
    });

    const answer = await this.waitForJob(session, this.checked(() => parseRequestId(response, 'device writing')));
    if (!answer || !('Cmd' in answer)) {
      throw this.serviceError(`Device ${id_device} did not accept ${register.key}`, undefined, answer);
    }
  }

  /**
   * Poll a job until it completes. Unexpected answers while polling are
   * retried; the last one is raised once the retries run out.
   */
  private async waitForJob(session: Session, idRequest: string): Promise<JsonObject | undefined> {
    let lastError: ServiceError | undefined;

    for (let attempt = 0; attempt <= this.options.jobPollRetries; attempt++) {
      if (attempt > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.options.jobPollInterval));
      }

      try {
        const status = await this.webcall(session, 'GET', API_PATH_DEVICE_JOB_STATUS + idRequest, {});
        const job = this.checked(() => parseJobStatus(status));
        if (job.jobAnswerStatus === 'completed') {
          this.options.log?.debug(`[DeviceRegistry] Job ${idRequest} completed`);
          return job.jobAnswerData;
        }
        lastError = new ServiceError(`Job ${idRequest} not completed (${job.jobAnswerStatus})`);
      } catch (error) {
        if (!(error instanceof ServiceError)) {
          throw error;
        }
        lastError = error;
      }
    }

    throw lastError ?? new ServiceError(`Job ${idRequest} not completed`);
  }

  /**
   * Authorized request. On a 401 the session is re-authenticated once and the
   * call retried once.
   */
  private async webcall(
    session: Session,
    method: 'GET' | 'POST',
    path: string,
    data: object,
  ): Promise<unknown> {
    await this.sessionManager.ensureValid(session);
    let response = await this.send(session, method, path, data);

    if (response.status === 401) {
      this.options.log?.debug(`[DeviceRegistry] ${path} unauthorized, re-authenticating`);
      this.sessionManager.invalidate(session);
      await this.sessionManager.ensureValid(session);
      response = await this.send(session, method, path, data);

      if (response.status === 401) {
        throw new AuthenticationError(`Not authorized for ${path} after re-authentication`);
      }
    }

    if (response.status !== 200) {
      throw this.serviceError(`Unexpected status ${response.status} for ${path}`, response.status, response.data);
    }
    return response.data;
  }

  private send(session: Session, method: 'GET' | 'POST', path: string, data: object): Promise<ApiResponse> {
    return this.api.request(method, path, data, {
      local: 'false',
      Authorization: session.token ?? '',
    });
  }

  /**
   * Run a body parser, logging the payload shape of a body it rejects
   */
  private checked<T>(parse: () => T): T {
    try {
      return parse();
    } catch (error) {
      if (error instanceof ServiceError) {
        this.options.log?.error(`[DeviceRegistry] ${error.message}, payload:`, error.payloadShape);
      }
      throw error;
    }
  }

  private serviceError(message: string, status: number | undefined, body: unknown): ServiceError {
    const shape = describeShape(body);
    this.options.log?.error(`[DeviceRegistry] ${message}, payload:`, shape);
    return new ServiceError(message, status, shape);
  }
}
