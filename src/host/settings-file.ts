import { readFile } from 'node:fs/promises';
import { DEFAULT_ENGINE_SETTINGS, settingsFromPairs } from '@/lib/settings';
import type { EngineSettings } from '@/lib/settings';
import { isNotFound } from './errors';

/**
 * Read engine settings from a JSON object of `{ "key": value }` pairs. A
 * missing file yields the defaults; unknown keys and bad values are ignored.
 */
export async function loadSettingsFile(path: string): Promise<EngineSettings> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return { ...DEFAULT_ENGINE_SETTINGS };
    throw err;
  }

  const parsed: unknown = JSON.parse(text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Settings file ${path} must contain a JSON object`);
  }
  return settingsFromPairs(Object.entries(parsed).map(([key, value]): [string, string] => [key, String(value)]));
}
