/**
 * Record values - accumulation rules for scalar, list and unknown fields
 */

import { RisFieldValue, RisRecord, RisValue, UnknownTags } from './types';

export function isUnknownTags(value: RisValue | undefined): value is UnknownTags {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toList(value: RisFieldValue): string[] {
  return Array.isArray(value) ? [...value] : [value];
}

export function splitDelimited(content: string, delimiter: string): string[] {
  return content.split(delimiter).map((part) => part.trim());
}

/**
 * Appends to a list field, creating it on first use. A scalar already stored
 * under the name becomes the first element.
 */
export function appendListValue(record: RisRecord, field: string, values: readonly string[]): void {
  const existing = record[field];
  if (Array.isArray(existing)) {
    existing.push(...values);
  } else if (typeof existing === 'string') {
    record[field] = [existing, ...values];
  } else {
    record[field] = [...values];
  }
}

/**
 * Stores a scalar occurrence. A repeated occurrence keeps the first value
 * unless `promote` is set, in which case the field becomes a list.
 */
export function addScalarValue(record: RisRecord, field: string, value: RisFieldValue, promote: boolean): void {
  const existing = record[field];
  if (existing === undefined || isUnknownTags(existing)) {
    record[field] = Array.isArray(value) ? [...value] : value;
    return;
  }
  if (promote) {
    appendListValue(record, field, toList(value));
  }
}

/**
 * Continues a wrapped scalar value: the new text is joined to the stored one
 * with a single space. When the field already holds a list, the text is
 * joined to its last element, or appended as parts when `parts` is given.
 */
export function extendScalarValue(record: RisRecord, field: string, text: string, parts: string[] | null): void {
  const existing = record[field];
  if (typeof existing === 'string') {
    record[field] = existing ? `${existing} ${text}` : text;
    return;
  }
  if (Array.isArray(existing) && existing.length > 0) {
    if (parts !== null) {
      existing.push(...parts);
      return;
    }
    const last = existing.length - 1;
    existing[last] = `${existing[last] ?? ''} ${text}`;
    return;
  }
  record[field] = parts ?? text;
}

export function addUnknownValue(record: RisRecord, field: string, tag: string, value: string): void {
  const existing = record[field];
  const container: UnknownTags = isUnknownTags(existing) ? existing : {};
  record[field] = container;
  const values = container[tag];
  if (values) {
    values.push(value);
  } else {
    container[tag] = [value];
  }
}

/**
 * Splits every entry of a list field on `;`, trimming the parts. A scalar is
 * treated as a one-element list.
 */
export function splitSemicolonList(record: RisRecord, field: string): void {
  const existing = record[field];
  if (existing === undefined || isUnknownTags(existing)) {
    return;
  }
  record[field] = toList(existing).flatMap((entry) => splitDelimited(entry, ';'));
}
