import { ConfigurationError, RisError } from './errors';
import { TYPE_OF_REFERENCE_MAPPING } from './tags';
import { RisRecord } from './types';

/**
 * Swaps keys and values. Two keys sharing a value would make the inverse
 * ambiguous, so that is rejected.
 */
export function invertMapping(mapping: Readonly<Record<string, string>>): Record<string, string> {
  const inverted: Record<string, string> = {};
  const duplicates: string[] = [];
  for (const [key, value] of Object.entries(mapping)) {
    if (Object.prototype.hasOwnProperty.call(inverted, value)) {
      duplicates.push(`${value} (${inverted[value]}, ${key})`);
      continue;
    }
    inverted[value] = key;
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError('Mapping cannot be inverted; some values were not unique', duplicates);
  }
  return inverted;
}

export interface ConvertReferenceTypesOptions {
  // readable name -> type code instead of type code -> readable name
  reverse?: boolean | undefined;
  // throw for a type found on neither side of the table
  strict?: boolean | undefined;
  typeMap?: Readonly<Record<string, string>> | undefined;
}

/**
 * Returns copies of the records with `type_of_reference` translated between
 * RIS type codes (`JOUR`) and readable names (`Journal`). Records without a
 * string type are copied unchanged.
 */
export function convertReferenceTypes(
  records: readonly RisRecord[],
  options: ConvertReferenceTypesOptions = {},
): RisRecord[] {
  const typeMap = options.typeMap ?? TYPE_OF_REFERENCE_MAPPING;
  const lookup = new Map(Object.entries(options.reverse ? invertMapping(typeMap) : typeMap));
  const targets = new Set(lookup.values());

  return records.map((record) => {
    const copy = structuredClone(record);
    const current = copy['type_of_reference'];
    if (typeof current !== 'string') {
      return copy;
    }
    const converted = lookup.get(current);
    if (converted !== undefined) {
      copy['type_of_reference'] = converted;
    } else if (options.strict && !targets.has(current)) {
      throw new RisError(`Type "${current}" not found.`);
    }
    return copy;
  });
}
