/**
 * Device Resolver: turns the configured target into a concrete device and
 * profile for one job.
 *
 * BLE name prefix   -> bounded scan, first advertisement whose name starts
 *                      with the prefix (case-insensitive), else DeviceNotFound.
 * BLE address       -> same scan only to learn the advertised name; the given
 *                      address is used whatever the scan sees.
 * Serial path       -> no discovery; the model override is mandatory.
 */

import {
  DEFAULT_BLE_MTU_BYTES,
  DEFAULT_SERIAL_MTU_BYTES,
  DEFAULT_WRITE_INTERVAL_MS,
  type DeviceProfile,
  type ResolvedDevice,
  type ResolvedProfile,
  type TargetSpec,
  type TransportKind,
} from '../models/device-profile.model';
import type { AdvertisedDevice, BleCentral } from '../models/link.model';
import { DeviceNotFoundError, ModelRequiredError, UnknownModelError } from '../utils/errors';
import { logger } from '../utils/logger';
import { normalizeWidth, type DeviceRegistry } from './device-registry.service';

export interface DeviceResolverOptions {
  readonly registry: DeviceRegistry;
  /** Required for BLE targets only */
  readonly central?: BleCentral;
  readonly scanTimeoutMs: number;
  /** Fail when a configured BLE address is not seen in the scan */
  readonly strictAddress?: boolean;
}

/** A hardware address contains the ':' delimiter; anything else is a name prefix */
export function isHardwareAddress(target: string): boolean {
  return target.includes(':');
}

/** Apply transport defaults for missing MTU / write interval, normalize width */
export function withDefaults(profile: DeviceProfile, kind: TransportKind): ResolvedProfile {
  return {
    model: profile.model,
    widthDots: normalizeWidth(profile.widthDots),
    imageMtuBytes: profile.imageMtuBytes ?? (kind === 'ble' ? DEFAULT_BLE_MTU_BYTES : DEFAULT_SERIAL_MTU_BYTES),
    writeIntervalMs: profile.writeIntervalMs ?? DEFAULT_WRITE_INTERVAL_MS,
  };
}

export class DeviceResolver {
  constructor(private readonly options: DeviceResolverOptions) {}

  async resolve(target: TargetSpec, signal?: AbortSignal): Promise<ResolvedDevice> {
    return target.kind === 'serial' ? this.resolveSerial(target) : this.resolveBle(target, signal);
  }

  /** Serial has nothing to discover: the model must be configured */
  resolveSerial(target: TargetSpec): ResolvedDevice {
    if (!target.modelOverride) {
      throw new ModelRequiredError();
    }
    const profile = this.lookupOrThrow(target.modelOverride);
    return {
      kind: 'serial',
      address: target.addressOrPath,
      profile: withDefaults(profile, 'serial'),
    };
  }

  private async resolveBle(target: TargetSpec, signal?: AbortSignal): Promise<ResolvedDevice> {
    const { central, scanTimeoutMs } = this.options;
    if (!central) {
      throw new DeviceNotFoundError('No Bluetooth adapter available');
    }

    const wanted = target.addressOrPath.toLowerCase();
    let address: string;
    let advertisedName: string | undefined;

    if (!isHardwareAddress(target.addressOrPath)) {
      const matches = (d: AdvertisedDevice) => (d.name ?? '').toLowerCase().startsWith(wanted);
      const devices = await central.scan({ timeoutMs: scanTimeoutMs, until: matches, signal });
      const match = devices.find(matches);
      if (!match) {
        throw new DeviceNotFoundError(`No BLE device found matching '${target.addressOrPath}'`);
      }
      address = match.address;
      advertisedName = match.name;
    } else {
      const matches = (d: AdvertisedDevice) => d.address.toLowerCase() === wanted;
      const devices = await central.scan({ timeoutMs: scanTimeoutMs, until: matches, signal });
      const match = devices.find(matches);
      if (!match && this.options.strictAddress) {
        throw new DeviceNotFoundError(`BLE device ${target.addressOrPath} was not seen during the scan`);
      }
      address = target.addressOrPath;
      advertisedName = match?.name;
    }

    const model = this.determineModel(target, advertisedName, address);
    logger.info({ address, advertisedName, model }, 'BLE printer resolved');
    return {
      kind: 'ble',
      address,
      advertisedName,
      profile: withDefaults(this.lookupOrThrow(model), 'ble'),
    };
  }

  /** Explicit override wins; otherwise infer from the advertised name */
  private determineModel(target: TargetSpec, advertisedName: string | undefined, address: string): string {
    if (target.modelOverride) return target.modelOverride;

    if (!advertisedName) {
      throw new UnknownModelError(
        `Cannot infer printer model for ${address}: no advertised name; set --model / PRINTER_MODEL`
      );
    }
    const inferred = this.options.registry.inferModel(advertisedName);
    if (!inferred) {
      throw new UnknownModelError(`Cannot infer printer model from name '${advertisedName}'; set --model / PRINTER_MODEL`);
    }
    return inferred;
  }

  private lookupOrThrow(model: string): DeviceProfile {
    const profile = this.options.registry.lookup(model);
    if (!profile) {
      throw new UnknownModelError(`Unknown printer model '${model}'`);
    }
    return profile;
  }
}
