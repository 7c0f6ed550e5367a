import { connect, IClientOptions, IClientPublishOptions, MqttClient } from 'mqtt';
import { ConnectTimeoutError } from './errors';
import type { Transport } from './topicRegistry';
import type { MQTTConfig } from './types';
import { describeError, error, log, warn } from './logger';

export type ConnectFn = (url: string, options: IClientOptions) => MqttClient;

// Receives connection changes and inbound messages from the client callbacks
export interface TransportListener {
  onConnect(reasonCode: number): void;
  onMessage(topic: string, payload: Buffer): void;
}

export function statusTopic(namespace: string): string {
  return `${namespace.replace(/^\/+|\/+$/g, '')}/controller/status`;
}

/**
 * mqtt.js backed transport. Errors raised by the listener inside client
 * callbacks are handed to the fatal handler instead of escaping into the
 * client's event emitter.
 */
export class MqttTransport implements Transport {
  client: MqttClient | null = null;
  private fatalHandler?: (err: unknown) => void;
  private fatal: { error: unknown } | null = null;

  // connectFn is injectable for tests
  constructor(private cfg: MQTTConfig, private connectFn: ConnectFn = connect) {}

  onFatal(cb: (err: unknown) => void) {
    this.fatalHandler = cb;
  }

  private fail(err: unknown) {
    error('Fatal transport error', describeError(err));
    if (!this.fatal) this.fatal = { error: err };
    if (this.fatalHandler) this.fatalHandler(err);
  }

  start(listener: TransportListener) {
    const url = `mqtt://${this.cfg.server}:${this.cfg.port}`;
    const options: IClientOptions = {
      clientId: this.cfg.client,
      username: this.cfg.user,
      password: this.cfg.password,
      reconnectPeriod: 5000,
      // the broker marks the controller OFFLINE if we vanish without stop()
      will: {
        topic: statusTopic(this.cfg.namespace),
        payload: Buffer.from('OFFLINE'),
        qos: 0,
        retain: true,
      },
    };
    log('Connecting to MQTT', url);
    this.client = this.connectFn(url, options);

    this.client.on('connect', (packet) => {
      try {
        listener.onConnect(packet.reasonCode ?? packet.returnCode ?? 0);
      } catch (err: unknown) {
        this.fail(err);
        return;
      }
      this.publish(statusTopic(this.cfg.namespace), 'ONLINE', { retain: true }).catch((err: unknown) => warn('Failed to publish ONLINE status', describeError(err)));
    });

    this.client.on('message', (topic: string, message: Buffer) => {
      try {
        listener.onMessage(topic, message);
      } catch (err: unknown) {
        this.fail(err);
      }
    });

    this.client.on('error', (err: Error) => {
      // a CONNACK refusal carries a numeric reason code; socket errors carry strings
      const code = 'code' in err ? err.code : undefined;
      if (typeof code === 'number' && code !== 0) {
        try {
          listener.onConnect(code);
        } catch (refused: unknown) {
          this.fail(refused);
        }
        return;
      }
      warn('MQTT error', describeError(err));
    });
    this.client.on('close', () => log('MQTT connection closed'));
  }

  get connected(): boolean {
    return this.client?.connected === true;
  }

  // Poll the connected flag until the broker accepts us, refuses us, or the
  // timeout expires
  async waitForConnection(timeoutMs: number, intervalMs = 100): Promise<void> {
    const started = Date.now();
    while (!this.connected) {
      if (this.fatal) throw this.fatal.error;
      if (Date.now() - started > timeoutMs) throw new ConnectTimeoutError(timeoutMs);
      await new Promise((resolve) => setTimeout(resolve, intervalMs));
    }
  }

  subscribe(topic: string): Promise<void> {
    const client = this.client;
    if (!client) return Promise.reject(new Error('MQTT client not started'));
    return new Promise<void>((resolve, reject) => {
      client.subscribe(topic, { qos: 0 }, (err, granted) => {
        if (err) return reject(err);
        // SUBACK return code 128 means the broker refused the subscription
        const refused = (granted ?? []).find((g) => g.qos === 128);
        if (refused) return reject(new Error(`broker refused ${refused.topic}`));
        resolve();
      });
    });
  }

  unsubscribe(topic: string): Promise<void> {
    const client = this.client;
    if (!client) return Promise.reject(new Error('MQTT client not started'));
    return new Promise<void>((resolve, reject) => {
      client.unsubscribe(topic, {}, (err) => {
        if (err) return reject(err);
        resolve();
      });
    });
  }

  publish(topic: string, payload: string, options: IClientPublishOptions = { qos: 0, retain: false }): Promise<void> {
    const client = this.client;
    if (!client) {
      warn('MQTT client not connected; cannot publish', topic);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      client.publish(topic, payload, options, (err) => {
        if (err) return reject(err);
        resolve();
      });
    });
  }

  // Publish OFFLINE and close the connection
  async stop(): Promise<void> {
    const client = this.client;
    if (!client) return;
    try {
      await this.publish(statusTopic(this.cfg.namespace), 'OFFLINE', { retain: true });
    } catch (err: unknown) {
      warn('Failed to publish OFFLINE status', describeError(err));
    }
    await new Promise<void>((resolve) => client.end(false, {}, () => resolve()));
    this.client = null;
  }
}

export default MqttTransport;
