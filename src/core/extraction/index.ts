/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { FieldExtractor } from './field-extractor.js';
export {
  DEFAULT_FIELD_RULES,
  FIELD_NAMES,
  defineRule,
  matchRule,
  validateRuleSet,
  type FieldRule,
  type FieldRuleSet,
} from './rules.js';
export { toFloat, toInteger, toTimestamp, type FieldConverter } from './converters.js';
