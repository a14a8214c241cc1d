import { isDeepStrictEqual } from 'util';
import type { JsonValue, MemoryFilter, MemoryItem } from './types';

export function matchesFilter(item: MemoryItem, filter: MemoryFilter): boolean {
  if (filter.keyPrefix !== undefined && !item.key.startsWith(filter.keyPrefix)) {
    return false;
  }
  if (filter.storedAfter !== undefined && item.storedAt <= filter.storedAfter) {
    return false;
  }
  if (filter.storedBefore !== undefined && item.storedAt >= filter.storedBefore) {
    return false;
  }

  if (filter.metadata) {
    for (const [name, expected] of Object.entries(filter.metadata)) {
      if (item.metadata[name] !== expected) {
        return false;
      }
    }
  }

  if (filter.where) {
    const value = item.value;
    if (!isJsonObject(value)) {
      return false;
    }
    for (const [field, expected] of Object.entries(filter.where)) {
      if (!Object.prototype.hasOwnProperty.call(value, field)) {
        return false;
      }
      if (!fieldMatches(value[field], expected)) {
        return false;
      }
    }
  }

  return true;
}

function fieldMatches(actual: JsonValue | undefined, expected: JsonValue): boolean {
  if (actual === undefined) {
    return false;
  }
  if (typeof expected === 'string') {
    const text = typeof actual === 'string' ? actual : JSON.stringify(actual);
    return text.toLowerCase().includes(expected.toLowerCase());
  }
  return isDeepStrictEqual(actual, expected);
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
