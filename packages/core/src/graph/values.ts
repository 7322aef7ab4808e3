import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isRelationship,
  isTime,
} from 'neo4j-driver';

import type { GraphValue } from '@clinigraph/types';

/**
 * Convert a value returned by the driver into plain JSON-compatible data.
 * Integers outside the safe range become strings.
 */
export function toGraphValue(value: unknown): GraphValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isTime(value) ||
    isLocalTime(value) ||
    isDuration(value)
  ) {
    return value.toString();
  }
  if (isNode(value) || isRelationship(value)) {
    return toGraphValue(value.properties);
  }
  if (Array.isArray(value)) {
    return value.map(toGraphValue);
  }
  if (typeof value === 'object') {
    const result: Record<string, GraphValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toGraphValue(entry);
    }
    return result;
  }
  return String(value);
}
