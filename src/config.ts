import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { ConfigError } from './errors';
import { parseClock } from './schedule';
import type { ConfigSchema, DeviceConfig, DeviceKind, LightDefaults, ScheduleConfig } from './types';

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  return String(value);
}

// Non-negative number with a default; `what` names the key in error messages
function nonNegative(value: unknown, fallback: number, what: string): number {
  if (value === undefined || value === null) return fallback;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new ConfigError(`Invalid configuration: ${what} must be a non-negative number`);
  }
  return n;
}

function parseDefaults(value: unknown, name: string): LightDefaults | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) throw new ConfigError(`Invalid device ${name}: defaults must be a mapping`);
  const defaults: LightDefaults = {};
  if (value.brightness !== undefined) defaults.brightness = nonNegative(value.brightness, 0, `device ${name} defaults.brightness`);
  if (value.colorTemp !== undefined) defaults.colorTemp = nonNegative(value.colorTemp, 0, `device ${name} defaults.colorTemp`);
  if (value.powerOnBehavior !== undefined) defaults.powerOnBehavior = String(value.powerOnBehavior);
  return defaults;
}

function parseSchedule(value: unknown, name: string): ScheduleConfig | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value) || value.on === undefined || value.off === undefined) {
    throw new ConfigError(`Invalid device ${name}: schedule must include on and off`);
  }
  const schedule: ScheduleConfig = { on: String(value.on), off: String(value.off) };
  // validate early so a typo fails at startup rather than on the first tick
  parseClock(schedule.on);
  parseClock(schedule.off);
  const timezone = optionalString(value.timezone);
  if (timezone) schedule.timezone = timezone;
  return schedule;
}

function parseDevice(name: unknown, value: RawObject, context: string): DeviceConfig {
  const ieee = optionalString(value.ieee ?? value.ieee_address);
  const type = optionalString(value.type);
  if (!name || !ieee || !type) {
    throw new ConfigError(`Invalid ${context}: each device must include name, ieee and type`);
  }
  const deviceName = String(name);
  if (type !== 'light' && type !== 'plug') {
    throw new ConfigError(`Invalid ${context}: device ${deviceName} type must be light or plug`);
  }
  const kind: DeviceKind = type;
  const device: DeviceConfig = { name: deviceName, ieee, type: kind };
  const defaults = parseDefaults(value.defaults, deviceName);
  if (defaults) device.defaults = defaults;
  const schedule = parseSchedule(value.schedule, deviceName);
  if (schedule) device.schedule = schedule;
  return device;
}

export function loadConfig(filePath?: string): ConfigSchema {
  const configPath = filePath || path.resolve(process.cwd(), 'config.yaml');
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, 'utf8');
  const parsed: unknown = YAML.parse(raw);
  if (!isObject(parsed) || !isObject(parsed.mqtt)) {
    throw new ConfigError('Invalid configuration: mqtt section missing');
  }
  if (parsed.devices === undefined || parsed.devices === null) {
    throw new ConfigError('Invalid configuration: devices missing');
  }

  // Normalize devices to DeviceConfig[] regardless of input shape
  let devices: DeviceConfig[];
  if (Array.isArray(parsed.devices)) {
    devices = parsed.devices.map((d: unknown) => {
      if (!isObject(d)) throw new ConfigError('Invalid devices array: each device must include name, ieee and type');
      return parseDevice(d.name, d, 'devices array');
    });
  } else if (isObject(parsed.devices)) {
    // Map keyed by name: { porch: { ieee: '0x…', type: 'light' } }
    devices = Object.entries(parsed.devices).map(([name, value]) => {
      if (!isObject(value)) throw new ConfigError(`Invalid devices mapping: device ${name} must include ieee and type`);
      return parseDevice(name, value, 'devices mapping');
    });
  } else {
    throw new ConfigError('Invalid configuration: devices must be an array or mapping');
  }

  const names = devices.map((d) => d.name);
  if (new Set(names).size !== names.length) {
    throw new ConfigError('Duplicate device names found in configuration');
  }
  const addresses = devices.map((d) => d.ieee.toLowerCase());
  if (new Set(addresses).size !== addresses.length) {
    throw new ConfigError('Duplicate device ieee addresses found in configuration');
  }

  const mqtt = parsed.mqtt;
  const server = optionalString(mqtt.server);
  if (!server) throw new ConfigError('Invalid configuration: mqtt.server missing');
  const database = isObject(parsed.database) ? parsed.database : {};
  const loop = isObject(parsed.loop) ? parsed.loop : {};
  const importCfg = isObject(parsed.import) ? parsed.import : {};

  const config: ConfigSchema = {
    mqtt: {
      server,
      port: nonNegative(mqtt.port, 1883, 'mqtt.port'),
      namespace: optionalString(mqtt.namespace ?? mqtt.basetopic) ?? 'zigbee2mqtt',
      user: optionalString(mqtt.user),
      password: optionalString(mqtt.password),
      client: optionalString(mqtt.client),
      connectTimeoutSeconds: nonNegative(mqtt.connectTimeoutSeconds, 5, 'mqtt.connectTimeoutSeconds'),
    },
    database: {
      path: optionalString(database.path) ?? path.resolve(process.cwd(), 'inventory.db'),
    },
    loop: {
      tickMs: nonNegative(loop.tickMs, 300, 'loop.tickMs'),
      drainTimeoutMs: nonNegative(loop.drainTimeoutMs, 100, 'loop.drainTimeoutMs'),
      pendingTimeoutSeconds: nonNegative(loop.pendingTimeoutSeconds, 60, 'loop.pendingTimeoutSeconds'),
    },
    import: {
      timeoutSeconds: nonNegative(importCfg.timeoutSeconds, 5, 'import.timeoutSeconds'),
    },
    devices,
  };

  // Precedence: MQTT_PASSWORD_FILE > MQTT_PASSWORD > YAML value
  const filePathEnv = process.env.MQTT_PASSWORD_FILE;
  if (filePathEnv) {
    if (!fs.existsSync(filePathEnv)) {
      throw new ConfigError(`MQTT_PASSWORD_FILE is set but file not found: ${filePathEnv}`);
    }
    config.mqtt.password = fs.readFileSync(filePathEnv, 'utf8').trim();
  } else if (process.env.MQTT_PASSWORD) {
    config.mqtt.password = process.env.MQTT_PASSWORD;
  }
  return config;
}
