import type { DeviceRecordInput, InventoryStore } from './inventoryStore';
import { isPayload } from './codec';
import type { Payload } from './types';
import { debug } from './logger';

export type ReconcileResult = {
  upserted: number;
  retired: number;
};

// Accepted keys per field, first non-empty value wins
const KEYS = {
  ieeeAddress: ['ieee_address', 'ieeeAddress', 'ieee'],
  friendlyName: ['friendly_name', 'friendlyName', 'name'],
  networkAddress: ['network_address', 'networkAddress'],
  deviceType: ['type', 'device_type'],
  model: ['model', 'zigbee_model'],
  manufacturer: ['manufacturer', 'zigbee_manufacturer'],
  firmwareVersion: ['software_version', 'firmware_version'],
  firmwareBuildDate: ['software_build_id', 'firmware_build_date', 'date_code'],
} as const;

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function pick(descriptor: Payload, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = descriptor[key];
    if (!isEmpty(value)) return value;
  }
  return undefined;
}

function pickText(descriptor: Payload, keys: readonly string[]): string | undefined {
  const value = pick(descriptor, keys);
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

// Integer or integer-looking string; anything else is not a network address
export function parseNetworkAddress(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : undefined;
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return parseInt(value, 10);
  return undefined;
}

function formatDate(year: number, month: number, day: number): string | undefined {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return undefined;
  return d.toISOString().slice(0, 10);
}

/**
 * Parse a firmware build date into YYYY-MM-DD. Understands compact date codes
 * (20190608, optionally followed by a suffix), ISO dates and date-times,
 * numeric dates such as 06/08/2019 (month first) and textual dates such as
 * "Jun 8 2019". Returns undefined when unparsable.
 */
export function parseBuildDate(value: unknown): string | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString().slice(0, 10);
  }
  if (typeof value !== 'string') return undefined;
  const s = value.trim();
  if (s === '') return undefined;

  const compact = /^(\d{4})(\d{2})(\d{2})(?:$|[^\d])/.exec(s);
  if (compact) return formatDate(Number(compact[1]), Number(compact[2]), Number(compact[3]));

  const iso = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:$|[T\s])/.exec(s);
  if (iso) return formatDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  // numeric dates read month first, day first when the month can't be one
  const numeric = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4}|\d{2})$/.exec(s);
  if (numeric) {
    let month = Number(numeric[1]);
    let day = Number(numeric[2]);
    if (month > 12) [month, day] = [day, month];
    return formatDate(expandYear(numeric[3]), month, day);
  }

  // only month names are left to the platform parser; version-like strings
  // such as 2.1.022 must not turn into dates
  if (!/[a-z]{3}/i.test(s)) return undefined;
  const ms = Date.parse(s);
  if (Number.isNaN(ms)) return undefined;
  const d = new Date(ms);
  // a string naming its zone is read back in UTC, otherwise in local time
  if (/(?:\bGMT\b|\bUTC\b|Z$|[+-]\d{2}:?\d{2}$)/i.test(s)) {
    return formatDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
  }
  return formatDate(d.getFullYear(), d.getMonth() + 1, d.getDate());
}

// Two-digit years land within 50 years of the current one
function expandYear(raw: string): number {
  const year = Number(raw);
  if (raw.length === 4) return year;
  const current = new Date().getFullYear();
  let full = Math.floor(current / 100) * 100 + year;
  if (full > current + 49) full -= 100;
  else if (full < current - 50) full += 100;
  return full;
}

// Build ids are often version strings, so fall through to the next key
// (usually date_code) until one of them parses
function pickBuildDate(descriptor: Payload): string | undefined {
  for (const key of KEYS.firmwareBuildDate) {
    const parsed = parseBuildDate(descriptor[key]);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

/**
 * Align the inventory with a full device snapshot from the bridge.
 *
 * Every usable descriptor is upserted and marked active; every active record
 * missing from the snapshot is retired. It all happens in one transaction, so
 * a constraint violation anywhere leaves the store untouched.
 */
export function reconcile(store: InventoryStore, snapshot: readonly unknown[], now: () => Date = () => new Date()): ReconcileResult {
  return store.transaction((unit) => {
    const seen = new Set<string>();
    let upserted = 0;

    for (const descriptor of snapshot) {
      if (!isPayload(descriptor)) continue;
      const ieeeAddress = pickText(descriptor, KEYS.ieeeAddress);
      const friendlyName = pickText(descriptor, KEYS.friendlyName);
      if (!ieeeAddress || !friendlyName) {
        debug('Skipping device descriptor without ieee address or friendly name');
        continue;
      }

      const existing = unit.get(ieeeAddress);
      let record: DeviceRecordInput;
      if (existing) {
        // createdAt stays whatever the database assigned
        const { createdAt: _createdAt, ...stored } = existing;
        record = { ...stored, friendlyName };
      } else {
        record = {
          ieeeAddress,
          friendlyName,
          networkAddress: null,
          firmwareBuildDate: null,
          firmwareVersion: null,
          deviceType: null,
          model: null,
          manufacturer: null,
          retiredAt: null,
        };
      }

      const networkAddress = parseNetworkAddress(pick(descriptor, KEYS.networkAddress));
      if (networkAddress !== undefined) record.networkAddress = networkAddress;
      record.deviceType = pickText(descriptor, KEYS.deviceType) ?? record.deviceType;
      record.model = pickText(descriptor, KEYS.model) ?? record.model;
      record.manufacturer = pickText(descriptor, KEYS.manufacturer) ?? record.manufacturer;
      record.firmwareVersion = pickText(descriptor, KEYS.firmwareVersion) ?? record.firmwareVersion;
      const buildDate = pickBuildDate(descriptor);
      if (buildDate !== undefined) record.firmwareBuildDate = buildDate;
      record.retiredAt = null;

      if (existing) unit.update(record);
      else unit.insert(record);
      seen.add(ieeeAddress);
      upserted++;
    }

    let retired = 0;
    const retiredAt = now().toISOString();
    for (const active of unit.listActive()) {
      if (seen.has(active.ieeeAddress)) continue;
      const { createdAt: _createdAt, ...record } = active;
      unit.update({ ...record, retiredAt });
      retired++;
    }

    return { upserted, retired };
  });
}

export default reconcile;
