import type { Actuator } from './actuator';
import type { MessageQueue } from './messageQueue';
import type { Schedule } from './schedule';
import type { TopicRegistry } from './topicRegistry';
import type { InboundMessage, LoopConfig, OutboundMessage } from './types';
import { debug, log } from './logger';

export type AutomationTarget = {
  actuator: Actuator;
  // unscheduled actuators are tracked but never commanded
  schedule?: Schedule;
};

export type AutomationQueues = {
  inbound: MessageQueue<InboundMessage>;
  outbound: MessageQueue<OutboundMessage>;
};

/**
 * The application loop. Each tick drains the outbound queue into the
 * transport, then the inbound queue into the actuators, then brings every
 * scheduled actuator in line with its schedule.
 */
export class AutomationLoop {
  private running = false;
  private fatal: { error: unknown } | null = null;
  private wake?: () => void;

  constructor(
    private registry: TopicRegistry,
    private queues: AutomationQueues,
    private targets: AutomationTarget[],
    private cfg: LoopConfig,
    private now: () => Date = () => new Date()
  ) {}

  // Bind every actuator's availability and state topics
  async registerAll(): Promise<void> {
    for (const { actuator } of this.targets) {
      await this.registry.register(actuator.topics.availability, (payload) => actuator.onAvailability(payload));
      await this.registry.register(actuator.topics.state, (payload) => actuator.onReport(payload));
    }
  }

  // Record an error raised outside the loop; the next tick rethrows it
  fail(err: unknown): void {
    if (!this.fatal) this.fatal = { error: err };
    if (this.wake) this.wake();
  }

  async tick(): Promise<void> {
    this.throwIfFailed();
    for (;;) {
      const msg = await this.queues.outbound.pop(this.cfg.drainTimeoutMs);
      if (!msg) break;
      this.registry.processOutbound(msg.topic, msg.payload);
    }
    for (;;) {
      const msg = await this.queues.inbound.pop(this.cfg.drainTimeoutMs);
      if (!msg) break;
      this.registry.processInbound(msg.topic, msg.payload);
    }
    this.evaluate(this.now());
  }

  evaluate(now: Date): void {
    for (const { actuator, schedule } of this.targets) {
      if (!schedule || actuator.online !== true) continue;
      const shouldBeOn = schedule.isActive(now);
      if (shouldBeOn && actuator.isOff) {
        debug('Schedule turns on', actuator.name);
        actuator.requestOn();
      } else if (!shouldBeOn && actuator.on === true) {
        debug('Schedule turns off', actuator.name);
        actuator.requestOff();
      }
    }
  }

  async run(): Promise<void> {
    this.running = true;
    log('Automation loop running with', this.targets.length, 'actuators');
    try {
      while (this.running) {
        await this.tick();
        await this.sleep(this.cfg.tickMs);
      }
      this.throwIfFailed();
    } finally {
      this.running = false;
    }
  }

  stop(): void {
    this.running = false;
    if (this.wake) this.wake();
  }

  get isRunning(): boolean {
    return this.running;
  }

  private throwIfFailed() {
    if (this.fatal) throw this.fatal.error;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}

export default AutomationLoop;
