#!/usr/bin/env node
import { loadConfig } from './config';
import { fetchDeviceList } from './deviceList';
import SqliteInventoryStore, { InventoryStore } from './inventoryStore';
import { reconcile, ReconcileResult } from './reconciler';
import type { ConfigSchema, MQTTConfig } from './types';
import { describeError, error, log } from './logger';

export type ImportDeps = {
  fetchDevices?: (cfg: MQTTConfig, timeoutMs: number) => Promise<unknown[] | undefined>;
  openStore?: (dbPath: string) => InventoryStore & { close(): void };
};

/**
 * Pull the bridge's device list and reconcile it into the inventory.
 * Resolves `undefined` without opening the store when no list arrived, so a
 * silent bridge never retires the whole inventory.
 */
export async function importDevices(cfg: ConfigSchema, deps: ImportDeps = {}): Promise<ReconcileResult | undefined> {
  const fetchDevices = deps.fetchDevices ?? ((mqtt, timeoutMs) => fetchDeviceList(mqtt, timeoutMs));
  const openStore = deps.openStore ?? ((dbPath) => new SqliteInventoryStore(dbPath));

  const devices = await fetchDevices(cfg.mqtt, cfg.import.timeoutSeconds * 1000);
  if (!devices) return undefined;
  log('Received', devices.length, 'device descriptors');

  const store = openStore(cfg.database.path);
  try {
    return reconcile(store, devices);
  } finally {
    store.close();
  }
}

async function main() {
  try {
    const cfg = loadConfig(process.argv[2] || undefined);
    const result = await importDevices(cfg);
    if (!result) {
      error('Device list not received; inventory left untouched');
      process.exit(2);
    }
    log(`Stored/updated ${result.upserted} devices. Retired ${result.retired} devices`);
    process.exit(0);
  } catch (err: unknown) {
    error('Import failed', describeError(err));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
