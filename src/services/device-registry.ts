/**
 * Device registry built from the DEVICE_METADATA setting.
 *
 * DEVICE_METADATA is JSON of the form
 * `{"devices":[{"deviceName":"Door","deviceMac":"AA:BB:CC","archiveButtonX":1205,"archiveButtonY":240}]}`.
 */

import { DeviceMetadata } from '../types/alarm';
import { isRecord } from '../utils/guards';
import { Logger, describeError } from '../utils/logger';

export const DEFAULT_ARCHIVE_BUTTON = { x: 1205, y: 240 } as const;

export interface ScreenPoint {
  x: number;
  y: number;
}

function isDeviceMetadata(value: unknown): value is DeviceMetadata {
  return (
    isRecord(value) &&
    typeof value.deviceName === 'string' &&
    typeof value.deviceMac === 'string' &&
    typeof value.archiveButtonX === 'number' &&
    typeof value.archiveButtonY === 'number'
  );
}

export class DeviceRegistry {
  private readonly devices: DeviceMetadata[];

  constructor(devices: DeviceMetadata[] = []) {
    this.devices = devices;
  }

  /**
   * Parses DEVICE_METADATA. Malformed JSON or entries give an empty or
   * partial registry and a warning, so names fall back to device ids.
   */
  static fromJson(json: string | undefined, logger?: Logger): DeviceRegistry {
    if (!json) {
      return new DeviceRegistry();
    }

    try {
      const parsed: unknown = JSON.parse(json);
      const entries: unknown[] = isRecord(parsed) && Array.isArray(parsed.devices) ? parsed.devices : [];

      const devices = entries.filter(isDeviceMetadata);
      if (devices.length !== entries.length) {
        logger?.warn('Ignoring malformed device metadata entries', {
          ignored: entries.length - devices.length,
        });
      }
      return new DeviceRegistry(devices);
    } catch (error) {
      logger?.warn('DEVICE_METADATA is not valid JSON, device names fall back to ids', describeError(error));
      return new DeviceRegistry();
    }
  }

  private findByMac(deviceMac: string): DeviceMetadata | undefined {
    const wanted = deviceMac.toLowerCase();
    return this.devices.find((device) => device.deviceMac.toLowerCase() === wanted);
  }

  // Display name for a device, or the device id itself when unknown
  getDeviceName(deviceMac: string): string {
    if (!deviceMac) {
      return deviceMac;
    }
    return this.findByMac(deviceMac)?.deviceName ?? deviceMac;
  }

  getDeviceMac(deviceName: string): string | undefined {
    if (!deviceName) {
      return undefined;
    }
    const wanted = deviceName.toLowerCase();
    return this.devices.find((device) => device.deviceName.toLowerCase() === wanted)?.deviceMac;
  }

  // Where the archive button sits on this camera's event page
  getArchiveButton(deviceMac: string): ScreenPoint {
    const device = deviceMac ? this.findByMac(deviceMac) : undefined;
    return device
      ? { x: device.archiveButtonX, y: device.archiveButtonY }
      : { x: DEFAULT_ARCHIVE_BUTTON.x, y: DEFAULT_ARCHIVE_BUTTON.y };
  }
}
