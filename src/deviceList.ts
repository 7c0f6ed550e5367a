import { connect } from 'mqtt';
import { decodeArray } from './codec';
import type { ConnectFn } from './mqttTransport';
import type { MQTTConfig } from './types';
import { debug, describeError, log, warn } from './logger';

export function bridgeDevicesTopic(namespace: string): string {
  return `${namespace.replace(/^\/+|\/+$/g, '')}/bridge/devices`;
}

/**
 * Read the retained device list the bridge keeps on `<namespace>/bridge/devices`.
 * Resolves `undefined` when no list arrives within `timeoutMs`; messages
 * that are not a JSON array are ignored while waiting.
 */
export function fetchDeviceList(cfg: MQTTConfig, timeoutMs: number, connectFn: ConnectFn = connect): Promise<unknown[] | undefined> {
  const topic = bridgeDevicesTopic(cfg.namespace);
  const url = `mqtt://${cfg.server}:${cfg.port}`;
  log('Reading device list from', topic);
  const client = connectFn(url, {
    clientId: cfg.client ? `${cfg.client}-import` : undefined,
    username: cfg.user,
    password: cfg.password,
    reconnectPeriod: 1000,
  });

  return new Promise<unknown[] | undefined>((resolve) => {
    let settled = false;
    const finish = (devices: unknown[] | undefined) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      client.end(false, {}, () => resolve(devices));
    };
    const timer = setTimeout(() => {
      warn('No device list received on', topic, 'within', timeoutMs, 'ms');
      finish(undefined);
    }, timeoutMs);

    client.on('connect', () => {
      client.subscribe(topic, { qos: 0 }, (err) => {
        if (err) warn('Subscription to', topic, 'failed', describeError(err));
      });
    });
    client.on('message', (msgTopic: string, message: Buffer) => {
      if (msgTopic !== topic) return;
      const devices = decodeArray(message);
      if (!devices) {
        debug('Ignoring malformed device list on', topic);
        return;
      }
      finish(devices);
    });
    client.on('error', (err: Error) => warn('MQTT error', describeError(err)));
  });
}

export default fetchDeviceList;
