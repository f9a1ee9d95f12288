import { AuditError, ErrorCode } from '@position-audit/shared';
import {
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfigFromEnv,
  parseEngineConfig,
  parseEngineConfigJson,
} from '../../../src/config/ConfigSchema';
import { DETECTOR_NAMES, Severity } from '../../../src/types';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('parseEngineConfig', () => {
  it('fills in defaults', () => {
    expect(parseEngineConfig({})).toEqual({
      detectors: [...DETECTOR_NAMES],
      minSeverity: Severity.Low,
    });
    expect(parseEngineConfig(undefined)).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('removes duplicate detectors and keeps their order', () => {
    const config = parseEngineConfig({ detectors: ['weight', 'calculation', 'weight'] });
    expect(config.detectors).toEqual(['weight', 'calculation']);
  });

  it('rejects unknown detectors, an empty list and unknown severities', () => {
    for (const input of [{ detectors: ['volume'] }, { detectors: [] }, { minSeverity: 'Critical' }]) {
      const error = captureError(() => parseEngineConfig(input));
      expect(error).toBeInstanceOf(AuditError);
      expect(error).toMatchObject({ code: ErrorCode.CONFIG_VALIDATION_ERROR });
    }
  });

  it('reports the failing paths', () => {
    const error = captureError(() => parseEngineConfig({ minSeverity: 'Critical' }));
    expect(error).toMatchObject({
      context: { issues: [expect.objectContaining({ path: 'minSeverity' })] },
    });
  });
});

describe('parseEngineConfigJson', () => {
  it('parses a JSON document', () => {
    expect(parseEngineConfigJson('{"minSeverity":"Medium"}').minSeverity).toBe(Severity.Medium);
  });

  it('raises a parse error for invalid JSON', () => {
    const error = captureError(() => parseEngineConfigJson('{detectors:'));
    expect(error).toBeInstanceOf(AuditError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIG_PARSE_ERROR });
  });
});

describe('loadEngineConfigFromEnv', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadEngineConfigFromEnv({})).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(loadEngineConfigFromEnv({ AUDIT_DETECTORS: '  ', AUDIT_MIN_SEVERITY: '' })).toEqual(
      DEFAULT_ENGINE_CONFIG,
    );
  });

  it('reads a comma-separated detector list and a minimum severity', () => {
    expect(
      loadEngineConfigFromEnv({
        AUDIT_DETECTORS: 'weight, fx_consistency ,',
        AUDIT_MIN_SEVERITY: 'Medium',
      }),
    ).toEqual({ detectors: ['weight', 'fx_consistency'], minSeverity: Severity.Medium });
  });

  it('names unknown detectors', () => {
    const error = captureError(() =>
      loadEngineConfigFromEnv({ AUDIT_DETECTORS: 'weight,volume,liquidity' }),
    );

    expect(error).toBeInstanceOf(AuditError);
    expect(error).toMatchObject({
      code: ErrorCode.UNKNOWN_DETECTOR,
      message: 'Unknown detector(s): volume, liquidity',
    });
  });

  it('validates the severity', () => {
    const error = captureError(() => loadEngineConfigFromEnv({ AUDIT_MIN_SEVERITY: 'low' }));
    expect(error).toMatchObject({ code: ErrorCode.CONFIG_VALIDATION_ERROR });
  });
});
