/**
 * Engine configuration schema and loaders.
 *
 * Environment variables:
 *   AUDIT_DETECTORS     comma-separated detector names (default: all)
 *   AUDIT_MIN_SEVERITY  Low | Medium | High (default: Low)
 */

import { z } from 'zod';
import { AuditError, ErrorCode } from '@position-audit/shared';
import { DETECTOR_NAMES, DetectorName, Severity } from '../types';

export const DetectorNameSchema = z.enum(DETECTOR_NAMES);

export const SeveritySchema = z.nativeEnum(Severity);

export const EngineConfigSchema = z.object({
  detectors: z
    .array(DetectorNameSchema)
    .min(1, 'At least one detector must be enabled')
    .default([...DETECTOR_NAMES])
    .transform((names): DetectorName[] => Array.from(new Set(names))),
  minSeverity: SeveritySchema.default(Severity.Low),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  detectors: [...DETECTOR_NAMES],
  minSeverity: Severity.Low,
});

const isDetectorName = (name: string): name is DetectorName =>
  (DETECTOR_NAMES as readonly string[]).includes(name);

/**
 * Validate a configuration object, filling in defaults.
 */
export function parseEngineConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new AuditError(ErrorCode.CONFIG_VALIDATION_ERROR, 'Invalid engine configuration', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

/**
 * Parse and validate a JSON configuration document.
 */
export function parseEngineConfigJson(json: string): EngineConfig {
  // eslint-disable-next-line functional/no-let
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new AuditError(ErrorCode.CONFIG_PARSE_ERROR, 'Engine configuration is not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parseEngineConfig(raw);
}

/**
 * Build the configuration from environment variables. Unset or blank
 * variables fall back to the defaults.
 */
export function loadEngineConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const input: Record<string, unknown> = {};

  const detectors = env.AUDIT_DETECTORS?.trim();
  if (detectors) {
    const names = detectors
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name !== '');
    const unknown = names.filter((name) => !isDetectorName(name));
    if (unknown.length > 0) {
      throw new AuditError(
        ErrorCode.UNKNOWN_DETECTOR,
        `Unknown detector(s): ${unknown.join(', ')}`,
        { unknown, available: [...DETECTOR_NAMES] },
      );
    }
    input.detectors = names;
  }

  const minSeverity = env.AUDIT_MIN_SEVERITY?.trim();
  if (minSeverity) {
    input.minSeverity = minSeverity;
  }

  return parseEngineConfig(input);
}
