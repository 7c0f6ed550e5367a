#!/usr/bin/env node
import { createActuator } from './actuator';
import AutomationLoop, { AutomationTarget } from './automation';
import { loadConfig } from './config';
import { MessageQueue } from './messageQueue';
import MqttTransport from './mqttTransport';
import { createSchedule } from './schedule';
import TopicRegistry from './topicRegistry';
import type { InboundMessage, OutboundMessage } from './types';
import { describeError, error, log, warn } from './logger';

async function main() {
  let transport: MqttTransport | undefined;
  try {
    const cfgFile = process.argv[2] || undefined;
    const cfg = loadConfig(cfgFile);
    const inbound = new MessageQueue<InboundMessage>();
    const outbound = new MessageQueue<OutboundMessage>();
    transport = new MqttTransport(cfg.mqtt);
    const registry = new TopicRegistry(transport, inbound);

    const targets: AutomationTarget[] = cfg.devices.map((device) => ({
      actuator: createActuator(device, cfg.mqtt.namespace, outbound, {
        pendingTimeoutMs: cfg.loop.pendingTimeoutSeconds * 1000,
      }),
      schedule: createSchedule(device.schedule),
    }));
    const loop = new AutomationLoop(registry, { inbound, outbound }, targets, cfg.loop);
    // errors raised in transport callbacks end the loop on its next tick
    transport.onFatal((err) => loop.fail(err));

    transport.start(registry);
    await transport.waitForConnection(cfg.mqtt.connectTimeoutSeconds * 1000);
    await loop.registerAll();

    const shutdown = (sig: string) => {
      log(sig, 'received - shutting down');
      loop.stop();
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await loop.run();
    await transport.stop();
    process.exit(0);
  } catch (err: unknown) {
    error('Controller stopped', describeError(err));
    if (transport) {
      try {
        await transport.stop();
      } catch (e: unknown) {
        warn('Error while shutting down mqtt', describeError(e));
      }
    }
    process.exit(1);
  }
}

void main();
