/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ExtractedFields, FieldName } from '../types.js';
import { toFloat, toInteger, toTimestamp, type FieldConverter } from './converters.js';

/**
 * A named extraction rule. `pattern` is searched over the whole log text
 * and its first capture group is handed to `convert`.
 */
export interface FieldRule<K extends FieldName = FieldName> {
  readonly field: K;
  readonly pattern: RegExp;
  readonly convert: FieldConverter<ExtractedFields[K]>;
}

export type FieldRuleSet = { readonly [K in FieldName]: FieldRule<K> };

/** Extraction order. The first rule without a match is the one reported. */
export const FIELD_NAMES: readonly FieldName[] = Object.freeze([
  'alks',
  'rlks',
  'east',
  'west',
  'north',
  'south',
  'length',
  'width',
  'filtStartDt',
  'geocodingStartDt',
  'masterAscNodeTime',
  'slaveAscNodeTime',
] as const);

const NUMBER = String.raw`[-+]?(?:\d*\.\d+|\d+)`;
const LOG_TIME = String.raw`\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2},\d{3}`;
const NODE_TIME = String.raw`\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2}\.\d+`;

export const defineRule = <K extends FieldName>(
  field: K,
  pattern: RegExp,
  convert: FieldConverter<ExtractedFields[K]>,
): FieldRule<K> => Object.freeze({ field, pattern, convert });

const line = (source: string): RegExp => new RegExp(`^${source}`, 'm');

export const DEFAULT_FIELD_RULES: FieldRuleSet = Object.freeze({
  alks: defineRule('alks', line(String.raw`geocode\.Azimuth\s+looks\s+=\s+(\d+)`), toInteger),
  rlks: defineRule('rlks', line(String.raw`geocode\.Range\s+looks\s+=\s+(\d+)`), toInteger),
  east: defineRule('east', line(String.raw`geocode\.East\s+=\s+(${NUMBER})`), toFloat),
  west: defineRule('west', line(String.raw`geocode\.West\s+=\s+(${NUMBER})`), toFloat),
  north: defineRule('north', line(String.raw`geocode\.North\s+=\s+(${NUMBER})`), toFloat),
  south: defineRule('south', line(String.raw`geocode\.South\s+=\s+(${NUMBER})`), toFloat),
  length: defineRule('length', line(String.raw`geocode\.Length\s+=\s+(\d+)`), toInteger),
  width: defineRule('width', line(String.raw`geocode\.Width\s+=\s+(\d+)`), toInteger),
  filtStartDt: defineRule(
    'filtStartDt',
    line(String.raw`(${LOG_TIME}) - isce\.mroipac\.filter - INFO - Filtering interferogram`),
    toTimestamp(','),
  ),
  geocodingStartDt: defineRule(
    'geocodingStartDt',
    line(String.raw`(${LOG_TIME}) - isce\.topsinsar\.runGeocode - INFO - Geocoding Image`),
    toTimestamp(','),
  ),
  masterAscNodeTime: defineRule(
    'masterAscNodeTime',
    line(String.raw`master\.sensor\.ascendingnodetime\s+=\s+(${NODE_TIME})`),
    toTimestamp('.'),
  ),
  slaveAscNodeTime: defineRule(
    'slaveAscNodeTime',
    line(String.raw`slave\.sensor\.ascendingnodetime\s+=\s+(${NODE_TIME})`),
    toTimestamp('.'),
  ),
});

/**
 * Runs a single rule against the full text, always from the top.
 * Returns the first capture group of the first match.
 */
export const matchRule = (rule: Pick<FieldRule, 'pattern'>, text: string): string | undefined => {
  const match = rule.pattern.exec(text);
  return match?.[1];
};

const countCaptureGroups = (pattern: RegExp): number =>
  (new RegExp(`${pattern.source}|`).exec('')?.length ?? 1) - 1;

/**
 * Checks a rule table before use: every field present under its own name,
 * no stateful (`g`/`y`) patterns, at least one capture group each.
 */
export const validateRuleSet = (rules: FieldRuleSet): void => {
  for (const field of FIELD_NAMES) {
    const rule: FieldRule | undefined = rules[field];
    if (!rule) {
      throw new Error(`Rule set is missing a rule for "${field}".`);
    }
    if (rule.field !== field) {
      throw new Error(`Rule registered under "${field}" is named "${rule.field}".`);
    }
    if (rule.pattern.global || rule.pattern.sticky) {
      throw new Error(`Rule "${field}" must not use the g or y flag.`);
    }
    if (countCaptureGroups(rule.pattern) < 1) {
      throw new Error(`Rule "${field}" needs a capture group.`);
    }
  }
};
