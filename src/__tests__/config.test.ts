import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../config';
import { ConfigError } from '../errors';

const fixture = (name: string) => path.resolve(__dirname, 'fixtures', name);

describe('config loader', () => {
  const savedEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  beforeEach(() => {
    delete process.env.MQTT_PASSWORD;
    delete process.env.MQTT_PASSWORD_FILE;
  });

  test('parses array devices with defaults and schedules', () => {
    const cfg = loadConfig(fixture('config-array.yaml'));
    expect(cfg.mqtt).toEqual({
      server: 'broker.local',
      port: 1883,
      namespace: 'zigbee_home',
      user: 'controller',
      password: 'test-secret',
      client: undefined,
      connectTimeoutSeconds: 5,
    });
    expect(cfg.devices).toEqual([
      {
        name: 'porch',
        ieee: '0x0017880100000001',
        type: 'light',
        defaults: { brightness: 254, colorTemp: 250 },
        schedule: { on: '20:00', off: '04:00', timezone: 'UTC' },
      },
      { name: 'pump', ieee: '0xa4c1380000000002', type: 'plug' },
    ]);
    expect(cfg.loop).toEqual({ tickMs: 300, drainTimeoutMs: 100, pendingTimeoutSeconds: 60 });
    expect(cfg.import).toEqual({ timeoutSeconds: 5 });
  });

  test('parses mapping devices and explicit sections', () => {
    const cfg = loadConfig(fixture('config-map.yaml'));
    expect(cfg.devices.map((d) => d.name)).toEqual(['porch', 'pump']);
    expect(cfg.devices[1].schedule).toEqual({ on: '06:30', off: '07:15' });
    expect(cfg.mqtt.port).toBe(1884);
    expect(cfg.mqtt.namespace).toBe('zigbee_home');
    expect(cfg.mqtt.connectTimeoutSeconds).toBe(10);
    expect(cfg.database.path).toBe('/tmp/zac-inventory.db');
    expect(cfg.loop).toEqual({ tickMs: 500, drainTimeoutMs: 50, pendingTimeoutSeconds: 0 });
    expect(cfg.import.timeoutSeconds).toBe(8);
  });

  test('missing file throws', () => {
    expect(() => loadConfig(fixture('does-not-exist.yaml'))).toThrow(/Config file not found/);
  });

  test('missing mqtt section throws', () => {
    expect(() => loadConfig(fixture('invalid-missing-mqtt.yaml'))).toThrow('Invalid configuration: mqtt section missing');
  });

  test('invalid array missing name throws', () => {
    expect(() => loadConfig(fixture('invalid-array-missing-name.yaml'))).toThrow('Invalid devices array: each device must include name, ieee and type');
  });

  test('invalid map missing type throws', () => {
    expect(() => loadConfig(fixture('invalid-map-missing-type.yaml'))).toThrow(/devices mapping/);
  });

  test('unknown device type throws', () => {
    expect(() => loadConfig(fixture('invalid-unknown-type.yaml'))).toThrow('Invalid devices array: device blinds type must be light or plug');
  });

  test('duplicate device names throw', () => {
    expect(() => loadConfig(fixture('invalid-duplicate-array.yaml'))).toThrow(/Duplicate device names/);
  });

  test('duplicate ieee addresses throw', () => {
    expect(() => loadConfig(fixture('invalid-duplicate-ieee.yaml'))).toThrow(/Duplicate device ieee addresses/);
  });

  test('negative loop settings throw', () => {
    expect(() => loadConfig(fixture('invalid-negative-tick.yaml'))).toThrow('Invalid configuration: loop.tickMs must be a non-negative number');
  });

  test('bad schedule time throws a ConfigError', () => {
    expect(() => loadConfig(fixture('invalid-schedule-time.yaml'))).toThrow(ConfigError);
  });

  test('MQTT_PASSWORD overrides the file value', () => {
    process.env.MQTT_PASSWORD = 'env-secret';
    expect(loadConfig(fixture('config-array.yaml')).mqtt.password).toBe('env-secret');
  });

  test('MQTT_PASSWORD_FILE wins over MQTT_PASSWORD', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'zac-config-'));
    const file = path.join(dir, 'password');
    fs.writeFileSync(file, 'file-secret\n');
    process.env.MQTT_PASSWORD = 'env-secret';
    process.env.MQTT_PASSWORD_FILE = file;
    try {
      expect(loadConfig(fixture('config-array.yaml')).mqtt.password).toBe('file-secret');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('missing MQTT_PASSWORD_FILE throws', () => {
    process.env.MQTT_PASSWORD_FILE = path.join(os.tmpdir(), 'zac-no-such-password-file');
    expect(() => loadConfig(fixture('config-array.yaml'))).toThrow(/MQTT_PASSWORD_FILE is set but file not found/);
  });
});
