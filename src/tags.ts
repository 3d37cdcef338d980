/**
 * Default tag tables for each dialect
 */

import risTags from './data/ris-tags.json';
import wokTags from './data/wok-tags.json';
import pubmedTags from './data/pubmed-tags.json';
import referenceTypes from './data/reference-types.json';
import { DelimiterMapping, DialectName, TagMapping } from './types';

// Reserved tag whose field holds the container of unmapped tags
export const UNKNOWN_TAG = 'UK';

export const TAG_KEY_MAPPING: Readonly<TagMapping> = Object.freeze({ ...risTags.mapping });
export const LIST_TYPE_TAGS: readonly string[] = Object.freeze([...risTags.listTags]);
export const DELIMITED_TAG_MAPPING: Readonly<DelimiterMapping> = Object.freeze({});

export const WOK_TAG_KEY_MAPPING: Readonly<TagMapping> = Object.freeze({ ...wokTags.mapping });
export const WOK_LIST_TYPE_TAGS: readonly string[] = Object.freeze([...wokTags.listTags]);

export const PUBMED_TAG_KEY_MAPPING: Readonly<TagMapping> = Object.freeze({ ...pubmedTags.mapping });
export const PUBMED_LIST_TYPE_TAGS: readonly string[] = Object.freeze([...pubmedTags.listTags]);

// RIS reference type code -> readable name, e.g. JOUR -> Journal
export const TYPE_OF_REFERENCE_MAPPING: Readonly<Record<string, string>> = Object.freeze({ ...referenceTypes });

export interface DialectTags {
  mapping: Readonly<TagMapping>;
  listTags: readonly string[];
  delimiters: Readonly<DelimiterMapping>;
}

const DIALECT_TAGS: Record<DialectName, DialectTags> = {
  ris: { mapping: TAG_KEY_MAPPING, listTags: LIST_TYPE_TAGS, delimiters: DELIMITED_TAG_MAPPING },
  wok: { mapping: WOK_TAG_KEY_MAPPING, listTags: WOK_LIST_TYPE_TAGS, delimiters: {} },
  pubmed: { mapping: PUBMED_TAG_KEY_MAPPING, listTags: PUBMED_LIST_TYPE_TAGS, delimiters: {} },
};

export function defaultTagsFor(dialect: DialectName): DialectTags {
  return DIALECT_TAGS[dialect];
}
