import { ConfigError } from './errors';
import type { ScheduleConfig } from './types';

// Decides whether a group of actuators should be on at a given moment
export interface Schedule {
  isActive(now: Date): boolean;
}

// Parse HH:MM into minutes since midnight
export function parseClock(value: string): number {
  const m = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!m) throw new ConfigError(`Invalid time of day: ${value}`);
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  if (hours > 23 || minutes > 59) throw new ConfigError(`Invalid time of day: ${value}`);
  return hours * 60 + minutes;
}

/**
 * On between two clock times. When the off time is earlier than the on time
 * the window runs past midnight (e.g. 20:00 → 04:00). Equal times never match.
 */
export class TimeWindowSchedule implements Schedule {
  private onAt: number;
  private offAt: number;
  private formatter?: Intl.DateTimeFormat;

  constructor(cfg: ScheduleConfig) {
    this.onAt = parseClock(cfg.on);
    this.offAt = parseClock(cfg.off);
    if (cfg.timezone) {
      try {
        this.formatter = new Intl.DateTimeFormat('en-GB', { timeZone: cfg.timezone, hour: '2-digit', minute: '2-digit', hourCycle: 'h23' });
      } catch {
        throw new ConfigError(`Unknown timezone: ${cfg.timezone}`);
      }
    }
  }

  minuteOfDay(now: Date): number {
    if (!this.formatter) return now.getHours() * 60 + now.getMinutes();
    let hours = 0;
    let minutes = 0;
    for (const part of this.formatter.formatToParts(now)) {
      if (part.type === 'hour') hours = Number(part.value);
      if (part.type === 'minute') minutes = Number(part.value);
    }
    return hours * 60 + minutes;
  }

  isActive(now: Date): boolean {
    const t = this.minuteOfDay(now);
    if (this.onAt === this.offAt) return false;
    if (this.onAt < this.offAt) return t >= this.onAt && t < this.offAt;
    return t >= this.onAt || t < this.offAt;
  }
}

export function createSchedule(cfg: ScheduleConfig | undefined): Schedule | undefined {
  return cfg ? new TimeWindowSchedule(cfg) : undefined;
}
