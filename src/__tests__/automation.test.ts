import AutomationLoop from '../automation';
import { createActuator } from '../actuator';
import { MessageQueue } from '../messageQueue';
import TopicRegistry, { Transport } from '../topicRegistry';
import type { Schedule } from '../schedule';
import type { InboundMessage, LoopConfig, OutboundMessage } from '../types';

const loopCfg: LoopConfig = { tickMs: 0, drainTimeoutMs: 0, pendingTimeoutSeconds: 60 };

function setup(active: boolean) {
  const transport = {
    subscribe: jest.fn((_topic: string) => Promise.resolve()),
    unsubscribe: jest.fn((_topic: string) => Promise.resolve()),
    publish: jest.fn((_topic: string, _payload: string) => Promise.resolve()),
  } satisfies Transport;
  const inbound = new MessageQueue<InboundMessage>();
  const outbound = new MessageQueue<OutboundMessage>();
  const registry = new TopicRegistry(transport, inbound);
  const schedule: Schedule = { isActive: jest.fn(() => active) };
  const porch = createActuator({ name: 'porch', ieee: '0x01', type: 'light' }, 'z2m', outbound);
  const pump = createActuator({ name: 'pump', ieee: '0x02', type: 'plug' }, 'z2m', outbound);
  const loop = new AutomationLoop(
    registry,
    { inbound, outbound },
    [{ actuator: porch, schedule }, { actuator: pump }],
    loopCfg,
    () => new Date(2024, 0, 15, 21, 0)
  );
  return { transport, inbound, outbound, registry, schedule, porch, pump, loop };
}

describe('AutomationLoop', () => {
  test('registerAll binds availability and state topics for every actuator', async () => {
    const { registry, loop } = setup(true);
    await loop.registerAll();
    expect(registry.topics()).toEqual(['z2m/porch/availability', 'z2m/porch', 'z2m/pump/availability', 'z2m/pump']);
  });

  test('a tick drains outbound, then inbound, then applies the schedule', async () => {
    const { transport, inbound, outbound, porch, loop } = setup(true);
    await loop.registerAll();
    inbound.push({ topic: 'z2m/porch/availability', payload: { state: 'online' } });
    inbound.push({ topic: 'z2m/porch', payload: { state: 'OFF' } });

    await loop.tick();
    // commands queued during this tick go out on the next one
    expect(transport.publish).not.toHaveBeenCalled();
    expect(porch.online).toBe(true);
    expect(porch.pendingCommand).toBe(true);
    expect(outbound.size).toBe(3);

    await loop.tick();
    expect(transport.publish.mock.calls).toEqual([
      ['z2m/porch/get', '{"power_on_behavior":"","color_temp_startup":""}'],
      ['z2m/porch/set', '{"state":"ON","transition":0}'],
      ['z2m/porch/get', '{"state":""}'],
    ]);
  });

  test('actuators outside the window are switched off', async () => {
    const { inbound, outbound, porch, loop } = setup(false);
    await loop.registerAll();
    inbound.push({ topic: 'z2m/porch/availability', payload: { state: 'online' } });
    inbound.push({ topic: 'z2m/porch', payload: { state: 'ON' } });
    await loop.tick();
    expect(porch.pendingCommand).toBe(true);
    expect(outbound.size).toBe(3);
  });

  test('offline or unknown-state actuators are left alone', async () => {
    const { inbound, outbound, porch, schedule, loop } = setup(true);
    await loop.registerAll();
    inbound.push({ topic: 'z2m/porch', payload: { state: 'OFF' } });
    await loop.tick();
    expect(schedule.isActive).not.toHaveBeenCalled();
    expect(porch.pendingCommand).toBe(false);
    expect(outbound.size).toBe(0);
  });

  test('unscheduled actuators are never commanded', async () => {
    const { inbound, outbound, pump, loop } = setup(true);
    await loop.registerAll();
    inbound.push({ topic: 'z2m/pump/availability', payload: { state: 'online' } });
    inbound.push({ topic: 'z2m/pump', payload: { state: 'OFF' } });
    await loop.tick();
    expect(pump.pendingCommand).toBe(false);
    // only the read-back triggered by coming online
    expect(outbound.size).toBe(1);
  });

  test('an inbound message for an unbound topic ends the tick', async () => {
    const { inbound, loop } = setup(true);
    inbound.push({ topic: 'z2m/unknown', payload: {} });
    await expect(loop.tick()).rejects.toThrow('Message from z2m/unknown received but not registered');
  });

  test('a recorded failure is rethrown by the next tick', async () => {
    const { loop } = setup(true);
    loop.fail(new Error('broker refused'));
    await expect(loop.tick()).rejects.toThrow('broker refused');
  });

  test('run stops when asked', async () => {
    const { loop } = setup(true);
    const running = loop.run();
    expect(loop.isRunning).toBe(true);
    loop.stop();
    await expect(running).resolves.toBeUndefined();
    expect(loop.isRunning).toBe(false);
  });

  test('run rejects with a failure recorded while it sleeps', async () => {
    const { loop } = setup(true);
    const running = loop.run();
    loop.fail(new Error('connection lost'));
    await expect(running).rejects.toThrow('connection lost');
  });
});
