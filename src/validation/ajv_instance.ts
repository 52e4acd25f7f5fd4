/**
 * Ajv validation instance with schema validators
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import { loadSchema } from './schema_loader';
import type { RawPresetConfig, RawScoringConfig } from '@/scoring/scoring_config';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Lazy-loaded validators
let scoringConfigValidator: ValidateFunction<RawScoringConfig> | null = null;
let presetValidator: ValidateFunction<RawPresetConfig> | null = null;

export function getScoringConfigValidator(): ValidateFunction<RawScoringConfig> {
  if (!scoringConfigValidator) {
    scoringConfigValidator = ajv.compile<RawScoringConfig>(loadSchema('scoring_config.v1'));
  }
  return scoringConfigValidator;
}

export function getPresetValidator(): ValidateFunction<RawPresetConfig> {
  if (!presetValidator) {
    presetValidator = ajv.compile<RawPresetConfig>(loadSchema('scoring_preset.v1'));
  }
  return presetValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateScoringConfig(data: unknown): ValidationResult<RawScoringConfig> {
  return runValidator(getScoringConfigValidator(), data);
}

export function validatePreset(data: unknown): ValidationResult<RawPresetConfig> {
  return runValidator(getPresetValidator(), data);
}
