import type { LogLevel } from '@/lib/log';
import { isLogLevel } from '@/lib/log';

/** Engine configuration. Stored as string key/value pairs by the host. */
export interface EngineSettings {
  /** Hour (0–23) at which the logical day starts; its first slot displays as "1". */
  dayStartHour: number;
  /** Consecutive automatic continuations allowed before a check-in is required. */
  checkInThreshold: number;
  /** Minutes into a break before the mid-slot break reminder fires. */
  breakNotifyMinutes: number;
  tickIntervalMs: number;
  snapshotIntervalSeconds: number;
  /** Throw on accounting invariant violations instead of logging them. */
  strictInvariants: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  dayStartHour: 8,
  checkInThreshold: 3,
  breakNotifyMinutes: 5,
  tickIntervalMs: 1000,
  snapshotIntervalSeconds: 5,
  strictInvariants: true,
  logLevel: 'info',
};

/** Setting keys as they appear in the settings store. */
export type SettingKey =
  | 'day_start_hour'
  | 'check_in_threshold'
  | 'break_notify_minutes'
  | 'tick_interval_ms'
  | 'snapshot_interval_seconds'
  | 'strict_invariants'
  | 'log_level';

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function parseInteger(value: string): number | null {
  if (!/^-?\d+$/.test(value.trim())) return null;
  return Number.parseInt(value, 10);
}

/**
 * Apply one stored key/value pair. Unknown keys and unparseable values leave
 * the settings unchanged.
 */
export function applySetting(settings: EngineSettings, key: string, value: string): EngineSettings {
  switch (key) {
    case 'day_start_hour': {
      const hour = parseInteger(value);
      if (hour !== null && hour >= 0 && hour <= 23) {
        return { ...settings, dayStartHour: hour };
      }
      return settings;
    }
    case 'check_in_threshold': {
      const threshold = parseInteger(value);
      if (threshold !== null && threshold >= 1) {
        return { ...settings, checkInThreshold: threshold };
      }
      return settings;
    }
    case 'break_notify_minutes': {
      const minutes = parseInteger(value);
      if (minutes !== null && minutes >= 1) {
        return { ...settings, breakNotifyMinutes: minutes };
      }
      return settings;
    }
    case 'tick_interval_ms': {
      const ms = parseInteger(value);
      if (ms !== null && ms >= 100) {
        return { ...settings, tickIntervalMs: ms };
      }
      return settings;
    }
    case 'snapshot_interval_seconds': {
      const seconds = parseInteger(value);
      if (seconds !== null && seconds >= 1) {
        return { ...settings, snapshotIntervalSeconds: seconds };
      }
      return settings;
    }
    case 'strict_invariants':
      if (value === 'true' || value === 'false') {
        return { ...settings, strictInvariants: value === 'true' };
      }
      return settings;
    case 'log_level':
      if (isLogLevel(value)) {
        return { ...settings, logLevel: value };
      }
      return settings;
    default:
      return settings;
  }
}

/** Build settings from the store's `[key, value]` pairs on top of the defaults. */
export function settingsFromPairs(pairs: Iterable<[string, string]>): EngineSettings {
  let settings: EngineSettings = { ...DEFAULT_ENGINE_SETTINGS };
  for (const [key, value] of pairs) {
    settings = applySetting(settings, key, value);
  }
  return settings;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Validate settings assembled in code (pairs are already filtered on parse). */
export function validateSettings(settings: EngineSettings): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(settings.dayStartHour) || settings.dayStartHour < 0 || settings.dayStartHour > 23) {
    errors.push('Day start hour must be an integer between 0 and 23');
  }
  if (!Number.isInteger(settings.checkInThreshold) || settings.checkInThreshold < 1) {
    errors.push('Check-in threshold must be at least 1');
  }
  if (!Number.isInteger(settings.breakNotifyMinutes) || settings.breakNotifyMinutes < 1) {
    errors.push('Break reminder must be at least 1 minute');
  }
  if (!Number.isFinite(settings.tickIntervalMs) || settings.tickIntervalMs < 100) {
    errors.push('Tick interval must be at least 100 ms');
  }
  if (!Number.isFinite(settings.snapshotIntervalSeconds) || settings.snapshotIntervalSeconds < 1) {
    errors.push('Snapshot interval must be at least 1 second');
  }

  return { valid: errors.length === 0, errors };
}
