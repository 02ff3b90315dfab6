/**
 * Requirements Taxonomy - Classifier Configuration
 *
 * Engine-level settings that sit beside the taxonomy document itself.
 */

import { DEFAULT_CLASSIFIER_CONFIG } from './types';
import type { ClassifierConfig } from './types';

/**
 * Create a classifier config from explicit overrides.
 *
 * Blank overrides are reported and replaced by the defaults.
 */
export function createClassifierConfig(overrides: Partial<ClassifierConfig> = {}): ClassifierConfig {
  const config: ClassifierConfig = {
    default_kind: overrides.default_kind ?? DEFAULT_CLASSIFIER_CONFIG.default_kind,
    default_unassigned_section_id:
      overrides.default_unassigned_section_id ?? DEFAULT_CLASSIFIER_CONFIG.default_unassigned_section_id,
    enable_debug: overrides.enable_debug ?? DEFAULT_CLASSIFIER_CONFIG.enable_debug,
  };

  const errors = validateClassifierConfig(config);
  if (errors.length === 0) return config;

  console.warn('[CLASSIFIER_CONFIG_INVALID] Using defaults for blank settings:', { errors });
  return {
    ...config,
    default_kind: config.default_kind.trim() || DEFAULT_CLASSIFIER_CONFIG.default_kind,
    default_unassigned_section_id:
      config.default_unassigned_section_id.trim() || DEFAULT_CLASSIFIER_CONFIG.default_unassigned_section_id,
  };
}

/**
 * Validate a classifier config. Returns a list of problems, empty when valid.
 */
export function validateClassifierConfig(config: ClassifierConfig): string[] {
  const errors: string[] = [];

  if (config.default_kind.trim().length === 0) {
    errors.push('default_kind must be a non-blank string');
  }

  if (config.default_unassigned_section_id.trim().length === 0) {
    errors.push('default_unassigned_section_id must be a non-blank string');
  }

  return errors;
}
