/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { MissingFieldError } from '../errors.js';
import { logConsole } from '../logging.js';
import { formatIsoTimestamp } from '../timestamp.js';
import type { ExtractedFields, FieldName, Timestamp } from '../types.js';
import { DEFAULT_FIELD_RULES, matchRule, validateRuleSet, type FieldRuleSet } from './rules.js';

/**
 * Pulls the required fields out of raw `isce.log` text.
 * All-or-nothing: the first rule without a match aborts extraction with
 * a {@link MissingFieldError}; conversion failures surface as
 * `MalformedValueError` from the rule's converter.
 */
export class FieldExtractor {
  private readonly rules: FieldRuleSet;

  constructor(rules: FieldRuleSet = DEFAULT_FIELD_RULES) {
    validateRuleSet(rules);
    this.rules = rules;
  }

  extract(text: string): ExtractedFields {
    return {
      alks: this.read('alks', text),
      rlks: this.read('rlks', text),
      east: this.read('east', text),
      west: this.read('west', text),
      north: this.read('north', text),
      south: this.read('south', text),
      length: this.read('length', text),
      width: this.read('width', text),
      filtStartDt: this.read('filtStartDt', text),
      geocodingStartDt: this.read('geocodingStartDt', text),
      masterAscNodeTime: this.read('masterAscNodeTime', text),
      slaveAscNodeTime: this.read('slaveAscNodeTime', text),
    };
  }

  private read<K extends FieldName>(field: K, text: string): ExtractedFields[K] {
    const rule = this.rules[field];
    const raw = matchRule(rule, text);
    if (raw === undefined) {
      throw new MissingFieldError(field, rule.pattern);
    }
    const value = rule.convert(raw, field);
    logConsole('debug', 'extract', `${field}: ${describeValue(value)}`);
    return value;
  }
}

const describeValue = (value: number | Timestamp): string =>
  typeof value === 'number' ? String(value) : formatIsoTimestamp(value);
