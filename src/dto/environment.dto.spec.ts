import { CATALOG_DEFAULTS, validateEnvironment } from './environment.dto';

describe('validateEnvironment', () => {
  it('should apply defaults to an empty environment', () => {
    const env = validateEnvironment({});

    expect(env.CATALOG_INPUT_DIR).toBe(CATALOG_DEFAULTS.inputDir);
    expect(env.CATALOG_MISSING_SOURCE_POLICY).toBe('abort');
    expect(env.CATALOG_PLATFORM_POLICY).toBe('canonical');
    expect(env.CATALOG_DESCRIPTION_MAX_LENGTH).toBe(1000);
    expect(env.CATALOG_REPORT_FILE).toBeUndefined();
  });

  it('should convert numeric strings', () => {
    expect(validateEnvironment({ CATALOG_DESCRIPTION_MAX_LENGTH: '500' }).CATALOG_DESCRIPTION_MAX_LENGTH).toBe(
      500,
    );
  });

  it('should accept the skip policy and passthrough platforms', () => {
    const env = validateEnvironment({
      CATALOG_MISSING_SOURCE_POLICY: 'skip',
      CATALOG_PLATFORM_POLICY: 'passthrough',
      CATALOG_REPORT_FILE: './out/report.json',
    });

    expect(env.CATALOG_MISSING_SOURCE_POLICY).toBe('skip');
    expect(env.CATALOG_PLATFORM_POLICY).toBe('passthrough');
    expect(env.CATALOG_REPORT_FILE).toBe('./out/report.json');
  });

  it('should reject unknown policies', () => {
    expect(() => validateEnvironment({ CATALOG_MISSING_SOURCE_POLICY: 'sometimes' })).toThrow(
      'Invalid environment configuration: CATALOG_MISSING_SOURCE_POLICY',
    );
  });

  it('should reject a non-numeric description length', () => {
    expect(() => validateEnvironment({ CATALOG_DESCRIPTION_MAX_LENGTH: 'long' })).toThrow(
      'CATALOG_DESCRIPTION_MAX_LENGTH',
    );
  });

  it('should reject an empty source list', () => {
    expect(() => validateEnvironment({ CATALOG_SOURCES: '' })).toThrow('CATALOG_SOURCES');
  });
});
