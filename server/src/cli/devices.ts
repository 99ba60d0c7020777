import type { AppConfig } from '../config.js';
import type { CliOptions } from './args.js';
import { endpointsFromIps } from '../stream/manager.js';
import { probeDevice, type ProbeResult } from '../stream/probe.js';
import { StartupError } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('devices');

export async function probeDevices(cfg: AppConfig, options: CliOptions): Promise<ProbeResult[]> {
  const ips = options.ips.length > 0 ? options.ips : cfg.deviceIps;
  if (ips.length === 0) {
    throw new StartupError('no_devices', 'No device addresses to probe', 'Set DEVICE_IPS or pass --ip <addr>.');
  }

  const endpoints = endpointsFromIps({ ips, names: cfg.deviceNames, port: cfg.imuPort, path: cfg.imuPath });
  const timeoutMs = options.timeoutMs ?? cfg.captureTimeoutMs;
  const results = await Promise.all(endpoints.map((endpoint) => probeDevice(endpoint, timeoutMs)));

  for (const result of results) {
    if (result.ok) {
      log.info(
        { deviceId: result.deviceId, url: result.url, latencyMs: result.latencyMs, accel: result.sample?.accelMagnitude },
        'Device streaming'
      );
    } else {
      log.warn({ deviceId: result.deviceId, url: result.url, error: result.error }, 'Device not streaming');
    }
  }
  return results;
}
