import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CUSTODY_ADDRESS,
  DEFAULT_MINIMUM_FEE,
  SettingsError,
  loadSettings,
} from '../src/config/settings.js';

const OWNER_ADDRESS = '0x0000000000000000000000000000000000000001';

function captureSettingsError(env: Record<string, string | undefined>): SettingsError {
  try {
    loadSettings(env);
  } catch (error) {
    if (error instanceof SettingsError) return error;
    throw error;
  }
  throw new Error('Expected loadSettings to throw');
}

describe('loadSettings', () => {
  it('requires an owner', () => {
    expect(captureSettingsError({}).variable).toBe('OWNER_ADDRESS');
  });

  it('fills defaults around the owner', () => {
    const settings = loadSettings({ OWNER_ADDRESS });

    expect(settings).toEqual({
      port: 3000,
      redisUrl: undefined,
      owner: OWNER_ADDRESS,
      auditor: OWNER_ADDRESS,
      custody: DEFAULT_CUSTODY_ADDRESS,
      minimumFee: DEFAULT_MINIMUM_FEE,
      refundTimeoutSeconds: 604_800,
      registryCooldownSeconds: 60,
      feeExemptTargets: [],
      eventHistoryLimit: 500,
    });
  });

  it('reads explicit values', () => {
    const settings = loadSettings({
      OWNER_ADDRESS,
      AUDITOR_ADDRESS: '0x00000000000000000000000000000000000000AA',
      PORT: '8080',
      REDIS_URL: 'redis://localhost:6379',
      MINIMUM_FEE: '5',
      REFUND_TIMEOUT_SECONDS: '60',
      FEE_EXEMPT_TARGETS: ' 0x00000000000000000000000000000000000000C1 ,,0x00000000000000000000000000000000000000c2',
    });

    expect(settings.auditor).toBe('0x00000000000000000000000000000000000000aa');
    expect(settings.port).toBe(8080);
    expect(settings.redisUrl).toBe('redis://localhost:6379');
    expect(settings.minimumFee).toBe(5n);
    expect(settings.refundTimeoutSeconds).toBe(60);
    expect(settings.feeExemptTargets).toEqual([
      '0x00000000000000000000000000000000000000c1',
      '0x00000000000000000000000000000000000000c2',
    ]);
  });

  it('names the offending variable', () => {
    expect(captureSettingsError({ OWNER_ADDRESS, PORT: '70000' }).variable).toBe('PORT');
    expect(captureSettingsError({ OWNER_ADDRESS, MINIMUM_FEE: '-5' }).variable).toBe('MINIMUM_FEE');
    expect(
      captureSettingsError({ OWNER_ADDRESS, REFUND_TIMEOUT_SECONDS: String(Number.MAX_SAFE_INTEGER) }).variable
    ).toBe('REFUND_TIMEOUT_SECONDS');
    expect(captureSettingsError({ OWNER_ADDRESS, AUDITOR_ADDRESS: '0x0000000000000000000000000000000000000000' }).variable).toBe(
      'AUDITOR_ADDRESS'
    );
    expect(captureSettingsError({ OWNER_ADDRESS, FEE_EXEMPT_TARGETS: 'nope' }).message).toBe(
      'FEE_EXEMPT_TARGETS: contains an invalid address "nope"'
    );
  });
});
