/**
 * Connection
 *
 * One authenticated Agua IoT account and its heating devices. Devices are
 * loaded eagerly by `connect`, so `devices` is populated once it resolves.
 *
 * A connection serves one caller at a time: overlapping calls may race on
 * token invalidation. Refresh several devices with `refreshAll`, or open one
 * connection per caller.
 */

import crypto from 'crypto';
import { resolveOptions } from './config';
import type { AguaIotOptions, ResolvedOptions } from './config';
import { AguaIotApi } from './api/AguaIotApi';
import { DeviceRegistry } from './api/DeviceRegistry';
import type { Device, DevicePhase } from './api/device';
import type { Session } from './api/Session';
import { SessionManager } from './api/SessionManager';
import { ValidationError } from './errors';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * A fresh client token. Generate it once per installation and keep reusing it.
 */
export function generateClientToken(): string {
  return crypto.randomUUID();
}

export class Connection {
  private constructor(
    private readonly session: Session,
    private readonly sessionManager: SessionManager,
    private readonly registry: DeviceRegistry,
    private readonly options: ResolvedOptions,
  ) {}

  /**
   * Log in and load every device of the account
   */
  public static async connect(
    email: string,
    password: string,
    clientToken: string,
    options?: AguaIotOptions,
  ): Promise<Connection> {
    if (!UUID_PATTERN.test(clientToken)) {
      throw new ValidationError('Client token must be a UUID');
    }

    const resolved = resolveOptions(options);
    const api = new AguaIotApi(resolved);
    const sessionManager = new SessionManager(api, resolved);
    const registry = new DeviceRegistry(api, sessionManager, resolved);

    const session = await sessionManager.authenticate(email, password, clientToken);
    await registry.load(session);

    resolved.log?.info(`[Connection] Connected, ${registry.devices().length} device(s)`);
    return new Connection(session, sessionManager, registry, resolved);
  }

  public get email(): string {
    return this.session.email;
  }

  /**
   * Device snapshots in the order the platform lists them
   */
  public get devices(): readonly Device[] {
    return this.registry.devices();
  }

  public device(idDevice: string): Device | undefined {
    return this.registry.get(idDevice);
  }

  public phase(device: Device): DevicePhase {
    return this.registry.phase(device.idDevice);
  }

  /**
   * Reload the device list, picking up devices added or removed remotely
   */
  public async reload(): Promise<readonly Device[]> {
    return this.registry.load(this.session);
  }

  public async refresh(device: Device): Promise<Device> {
    return this.registry.refresh(device, this.session);
  }

  /**
   * Refresh every device, one after the other
   */
  public async refreshAll(): Promise<readonly Device[]> {
    for (const device of this.registry.devices()) {
      await this.registry.refresh(device, this.session);
    }
    return this.registry.devices();
  }

  public async setPower(device: Device, on: boolean): Promise<Device> {
    return this.registry.setPower(device, this.session, on);
  }

  public async turnOn(device: Device): Promise<Device> {
    return this.setPower(device, true);
  }

  public async turnOff(device: Device): Promise<Device> {
    return this.setPower(device, false);
  }

  public async setTargetTemperature(device: Device, value: number): Promise<Device> {
    return this.registry.setTargetTemperature(device, this.session, value);
  }

  public async setMode(device: Device, mode: string): Promise<Device> {
    return this.registry.setMode(device, this.session, mode);
  }

  public async setPowerLevel(device: Device, level: number): Promise<Device> {
    return this.registry.setPowerLevel(device, this.session, level);
  }

  /**
   * Force the next call to log in again
   */
  public invalidateSession(): void {
    this.sessionManager.invalidate(this.session);
    this.options.log?.debug('[Connection] Session invalidated by caller');
  }
}

export const connect = Connection.connect.bind(Connection);
