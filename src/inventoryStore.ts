/**
 * Durable device inventory.
 *
 * One row per Zigbee device, keyed by its IEEE address. Rows are never
 * deleted: a device that disappears from the bridge gets `retired_at` set and
 * is revived by clearing it.
 */

import Database from 'better-sqlite3';

export type DeviceRecord = {
  ieeeAddress: string;
  friendlyName: string;
  networkAddress: number | null;
  // YYYY-MM-DD
  firmwareBuildDate: string | null;
  firmwareVersion: string | null;
  deviceType: string | null;
  model: string | null;
  manufacturer: string | null;
  // ISO 8601 UTC, assigned by the database on insert
  createdAt: string;
  // ISO 8601 UTC
  retiredAt: string | null;
};

export type DeviceRecordInput = Omit<DeviceRecord, 'createdAt'>;

export interface InventoryUnitOfWork {
  get(ieeeAddress: string): DeviceRecord | undefined;
  insert(record: DeviceRecordInput): void;
  update(record: DeviceRecordInput): void;
  listActive(): DeviceRecord[];
}

export interface InventoryStore {
  // Runs `work` atomically; a throw rolls back everything it wrote
  transaction<T>(work: (unit: InventoryUnitOfWork) => T): T;
}

type DeviceRow = {
  ieee_address: string;
  friendly_name: string;
  network_address: number | null;
  firmware_build_date: string | null;
  firmware_version: string | null;
  device_type: string | null;
  zigbee_model: string | null;
  zigbee_manufacturer: string | null;
  created_at: string;
  retired_at: string | null;
};

type DeviceParams = Omit<DeviceRow, 'created_at'>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS device (
    ieee_address TEXT NOT NULL PRIMARY KEY CHECK (length(ieee_address) <= 24),
    friendly_name TEXT NOT NULL UNIQUE CHECK (length(friendly_name) <= 120),
    network_address INTEGER,
    firmware_build_date TEXT,
    firmware_version TEXT CHECK (firmware_version IS NULL OR length(firmware_version) <= 60),
    device_type TEXT CHECK (device_type IS NULL OR length(device_type) <= 60),
    zigbee_model TEXT CHECK (zigbee_model IS NULL OR length(zigbee_model) <= 120),
    zigbee_manufacturer TEXT CHECK (zigbee_manufacturer IS NULL OR length(zigbee_manufacturer) <= 120),
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    retired_at TEXT,
    CONSTRAINT ck_device_network_address_range CHECK (
      network_address IS NULL OR (network_address >= 0 AND network_address <= 65535)
    )
  );
  CREATE INDEX IF NOT EXISTS idx_device_retired_at ON device(retired_at);
`;

function rowToRecord(row: DeviceRow): DeviceRecord {
  return {
    ieeeAddress: row.ieee_address,
    friendlyName: row.friendly_name,
    networkAddress: row.network_address,
    firmwareBuildDate: row.firmware_build_date,
    firmwareVersion: row.firmware_version,
    deviceType: row.device_type,
    model: row.zigbee_model,
    manufacturer: row.zigbee_manufacturer,
    createdAt: row.created_at,
    retiredAt: row.retired_at,
  };
}

function recordToParams(record: DeviceRecordInput): DeviceParams {
  return {
    ieee_address: record.ieeeAddress,
    friendly_name: record.friendlyName,
    network_address: record.networkAddress,
    firmware_build_date: record.firmwareBuildDate,
    firmware_version: record.firmwareVersion,
    device_type: record.deviceType,
    zigbee_model: record.model,
    zigbee_manufacturer: record.manufacturer,
    retired_at: record.retiredAt,
  };
}

export class SqliteInventoryStore implements InventoryStore {
  private db: Database.Database;
  private unit: InventoryUnitOfWork;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);

    const getStmt = this.db.prepare<[string], DeviceRow>('SELECT * FROM device WHERE ieee_address = ?');
    const insertStmt = this.db.prepare<[DeviceParams]>(`
      INSERT INTO device (ieee_address, friendly_name, network_address, firmware_build_date, firmware_version,
        device_type, zigbee_model, zigbee_manufacturer, retired_at)
      VALUES (@ieee_address, @friendly_name, @network_address, @firmware_build_date, @firmware_version,
        @device_type, @zigbee_model, @zigbee_manufacturer, @retired_at)
    `);
    // created_at is left alone on purpose: it is set once by the insert
    const updateStmt = this.db.prepare<[DeviceParams]>(`
      UPDATE device SET friendly_name=@friendly_name, network_address=@network_address,
        firmware_build_date=@firmware_build_date, firmware_version=@firmware_version, device_type=@device_type,
        zigbee_model=@zigbee_model, zigbee_manufacturer=@zigbee_manufacturer, retired_at=@retired_at
      WHERE ieee_address=@ieee_address
    `);
    const activeStmt = this.db.prepare<[], DeviceRow>('SELECT * FROM device WHERE retired_at IS NULL ORDER BY ieee_address');

    this.unit = {
      get: (ieeeAddress) => {
        const row = getStmt.get(ieeeAddress);
        return row ? rowToRecord(row) : undefined;
      },
      insert: (record) => {
        insertStmt.run(recordToParams(record));
      },
      update: (record) => {
        updateStmt.run(recordToParams(record));
      },
      listActive: () => activeStmt.all().map(rowToRecord),
    };
  }

  transaction<T>(work: (unit: InventoryUnitOfWork) => T): T {
    return this.db.transaction(() => work(this.unit))();
  }

  get(ieeeAddress: string): DeviceRecord | undefined {
    return this.unit.get(ieeeAddress);
  }

  list(): DeviceRecord[] {
    return this.db.prepare<[], DeviceRow>('SELECT * FROM device ORDER BY ieee_address').all().map(rowToRecord);
  }

  close(): void {
    this.db.close();
  }
}

export default SqliteInventoryStore;
