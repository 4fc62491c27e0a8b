import { COLUMN_SETTING, EXCLUDE_SETTING } from '../common/types';
import type { FieldSettings } from '../common/types';

/**
 * Parse an ORM-style tag string ("column:sku_code;index;-") into settings
 * Keys are upper-cased; a bare key maps to itself; values keep any further colons
 */
export function parseTagSettings(tag: string | undefined): Record<string, string> {
  const settings: Record<string, string> = {};
  if (!tag) {
    return settings;
  }

  for (const part of tag.split(';')) {
    if (part.trim() === '') {
      continue;
    }
    const [rawKey, ...rest] = part.split(':');
    const key = rawKey.trim().toUpperCase();
    settings[key] = rest.length > 0 ? rest.join(':') : key;
  }

  return settings;
}

/**
 * Merge the structured column/exclude options of a field over its tag settings
 */
export function buildFieldSettings(options: { tag?: string; column?: string; exclude?: boolean }): FieldSettings {
  const settings = parseTagSettings(options.tag);
  if (options.column) {
    settings[COLUMN_SETTING] = options.column;
  }
  if (options.exclude) {
    settings[EXCLUDE_SETTING] = EXCLUDE_SETTING;
  }
  return settings;
}
