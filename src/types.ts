// A decoded transport payload: always a JSON object
export type Payload = Record<string, unknown>;

export type InboundMessage = {
  topic: string;
  payload: Payload;
};

export type OutboundMessage = {
  topic: string;
  payload: Payload;
};

export type DeviceKind = 'light' | 'plug';

export type LightDefaults = {
  brightness?: number;
  colorTemp?: number;
  powerOnBehavior?: string;
};

export type ScheduleConfig = {
  // HH:MM, 24h clock
  on: string;
  off: string;
  // IANA zone name; local time when absent
  timezone?: string;
};

export type DeviceConfig = {
  // Zigbee friendly name, also the topic segment under the namespace
  name: string;
  // IEEE (hardware) address
  ieee: string;
  type: DeviceKind;
  defaults?: LightDefaults;
  schedule?: ScheduleConfig;
};

export type MQTTConfig = {
  server: string;
  port: number;
  // Zigbee2MQTT base topic
  namespace: string;
  user?: string;
  password?: string;
  client?: string;
  connectTimeoutSeconds: number;
};

export type DatabaseConfig = {
  path: string;
};

export type LoopConfig = {
  tickMs: number;
  drainTimeoutMs: number;
  // 0 disables the pending-command timeout
  pendingTimeoutSeconds: number;
};

export type ImportConfig = {
  timeoutSeconds: number;
};

export type ConfigSchema = {
  mqtt: MQTTConfig;
  database: DatabaseConfig;
  loop: LoopConfig;
  import: ImportConfig;
  devices: DeviceConfig[];
};
