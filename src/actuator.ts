import type { MessageQueue } from './messageQueue';
import type { DeviceConfig, DeviceKind, LightDefaults, OutboundMessage, Payload } from './types';
import { debug, log, warn } from './logger';

export type CommandState = 'ON' | 'OFF';

// 'sent' when a set/get pair was queued, 'pending' when an earlier command is
// still waiting for its confirming report
export type CommandStatus = 'sent' | 'pending';

export type DeviceTopics = {
  availability: string;
  state: string;
  set: string;
  get: string;
};

export function deviceTopics(namespace: string, name: string): DeviceTopics {
  const base = [namespace.replace(/^\/+|\/+$/g, ''), name].filter((p) => p.length > 0).join('/');
  return {
    availability: `${base}/availability`,
    state: base,
    set: `${base}/set`,
    get: `${base}/get`,
  };
}

export type LightAttributes = {
  kind: 'light';
  brightness?: number;
  colorMode?: string;
  colorTemp?: number;
  linkQuality?: number;
  powerOnBehavior?: string;
  colorTempStartup?: number;
  defaults: LightDefaults;
};

export type PlugAttributes = {
  kind: 'plug';
  linkQuality?: number;
};

export type ActuatorAttributes = LightAttributes | PlugAttributes;

/**
 * Device-class specific behavior. Each actuator owns one variant, which holds
 * the class's attributes and decides what to read and how to command.
 */
export interface DeviceVariant {
  readonly kind: DeviceKind;
  // keys to read back once the device comes online
  auxiliaryReadRequest(): Payload;
  commandPayload(state: CommandState): Payload;
  // absent keys leave the stored attribute untouched
  onReport(report: Payload): void;
  attributes(): ActuatorAttributes;
}

// Reported numbers arrive as numbers or numeric strings
function reportedInt(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return parseInt(value, 10);
  return undefined;
}

function reportedString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export class LightVariant implements DeviceVariant {
  readonly kind = 'light' as const;
  private attrs: LightAttributes;

  constructor(defaults: LightDefaults = {}) {
    this.attrs = { kind: 'light', defaults: { ...defaults } };
  }

  auxiliaryReadRequest(): Payload {
    return { power_on_behavior: '', color_temp_startup: '' };
  }

  commandPayload(state: CommandState): Payload {
    return { state, transition: 0 };
  }

  onReport(report: Payload): void {
    const brightness = reportedInt(report.brightness);
    const colorMode = reportedString(report.color_mode);
    const colorTemp = reportedInt(report.color_temp);
    const linkQuality = reportedInt(report.linkquality);
    const powerOnBehavior = reportedString(report.power_on_behavior);
    const colorTempStartup = reportedInt(report.color_temp_startup);
    if (brightness !== undefined) this.attrs.brightness = brightness;
    if (colorMode !== undefined) this.attrs.colorMode = colorMode;
    if (colorTemp !== undefined) this.attrs.colorTemp = colorTemp;
    if (linkQuality !== undefined) this.attrs.linkQuality = linkQuality;
    if (powerOnBehavior !== undefined) this.attrs.powerOnBehavior = powerOnBehavior;
    if (colorTempStartup !== undefined) this.attrs.colorTempStartup = colorTempStartup;
  }

  attributes(): LightAttributes {
    return { ...this.attrs, defaults: { ...this.attrs.defaults } };
  }
}

export class PlugVariant implements DeviceVariant {
  readonly kind = 'plug' as const;
  private attrs: PlugAttributes = { kind: 'plug' };

  auxiliaryReadRequest(): Payload {
    return { state: '' };
  }

  commandPayload(state: CommandState): Payload {
    return { state };
  }

  onReport(report: Payload): void {
    const linkQuality = reportedInt(report.linkquality);
    if (linkQuality !== undefined) this.attrs.linkQuality = linkQuality;
  }

  attributes(): PlugAttributes {
    return { ...this.attrs };
  }
}

export type ActuatorOptions = {
  // 0 or absent keeps a pending command until its report arrives
  pendingTimeoutMs?: number;
  now?: () => number;
};

export type ActuatorSnapshot = {
  name: string;
  ieeeAddress: string;
  online: boolean | null;
  on: boolean | null;
  pendingCommand: boolean;
  attributes: ActuatorAttributes;
};

/**
 * In-memory model of one switchable device.
 *
 * `requestOn`/`requestOff` queue a `set` command followed by a `get` read-back
 * and then ignore further requests until a state report confirms the change.
 * Only the automation loop touches an actuator, so no locking is involved.
 */
export class Actuator {
  readonly topics: DeviceTopics;
  private _online: boolean | null = null;
  private _on: boolean | null = null;
  private _pendingCommand = false;
  private pendingSince = 0;
  private pendingTimeoutMs: number;
  private now: () => number;

  constructor(
    readonly ieeeAddress: string,
    readonly name: string,
    namespace: string,
    readonly variant: DeviceVariant,
    private outbound: MessageQueue<OutboundMessage>,
    options: ActuatorOptions = {}
  ) {
    this.topics = deviceTopics(namespace, name);
    this.pendingTimeoutMs = options.pendingTimeoutMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get online(): boolean | null {
    return this._online;
  }

  get on(): boolean | null {
    return this._on;
  }

  get isOff(): boolean {
    return this._on === false;
  }

  get pendingCommand(): boolean {
    return this._pendingCommand;
  }

  get attributes(): ActuatorAttributes {
    return this.variant.attributes();
  }

  onAvailability(payload: Payload): void {
    const state = typeof payload.state === 'string' ? payload.state.toLowerCase() : undefined;
    if (state !== 'online' && state !== 'offline') {
      debug('Ignoring availability without state for', this.name);
      return;
    }
    const wasOnline = this._online;
    this._online = state === 'online';
    if (wasOnline !== this._online) log(this.name, 'is', state);
    if (this._online && wasOnline !== true) {
      this.outbound.push({ topic: this.topics.get, payload: this.variant.auxiliaryReadRequest() });
    }
  }

  onReport(payload: Payload): void {
    if (typeof payload.state === 'string') {
      this._on = payload.state === 'ON';
      this._pendingCommand = false;
    }
    this.variant.onReport(payload);
  }

  requestOn(): CommandStatus {
    return this.request('ON');
  }

  requestOff(): CommandStatus {
    return this.request('OFF');
  }

  // setOn(false) is the same request as setOff(true)
  setOn(value: boolean): CommandStatus {
    return this.request(value ? 'ON' : 'OFF');
  }

  setOff(value: boolean): CommandStatus {
    return this.request(value ? 'OFF' : 'ON');
  }

  snapshot(): ActuatorSnapshot {
    return {
      name: this.name,
      ieeeAddress: this.ieeeAddress,
      online: this._online,
      on: this._on,
      pendingCommand: this._pendingCommand,
      attributes: this.variant.attributes(),
    };
  }

  private request(state: CommandState): CommandStatus {
    if (this._pendingCommand) {
      const age = this.now() - this.pendingSince;
      if (this.pendingTimeoutMs <= 0 || age < this.pendingTimeoutMs) return 'pending';
      warn('Command for', this.name, 'unconfirmed after', age, 'ms - reissuing');
      this._pendingCommand = false;
    }
    this.outbound.push({ topic: this.topics.set, payload: this.variant.commandPayload(state) });
    this.outbound.push({ topic: this.topics.get, payload: { state: '' } });
    this._pendingCommand = true;
    this.pendingSince = this.now();
    debug('Requested', state, 'for', this.name);
    return 'sent';
  }
}

export function createVariant(device: DeviceConfig): DeviceVariant {
  switch (device.type) {
    case 'light':
      return new LightVariant(device.defaults);
    case 'plug':
      return new PlugVariant();
  }
}

export function createActuator(device: DeviceConfig, namespace: string, outbound: MessageQueue<OutboundMessage>, options: ActuatorOptions = {}): Actuator {
  return new Actuator(device.ieee, device.name, namespace, createVariant(device), outbound, options);
}

export default Actuator;
