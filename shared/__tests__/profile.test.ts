import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  validateDischargeProfile,
  normalizeStepRecord,
  parseProfileRecords,
  formatStepLabel,
  freezeProfile,
  PROFILE_LIMITS,
} from '../profile.js';
import type { DischargeProfile, DischargeStep } from '../types.js';

const CC_STEP: DischargeStep = { kind: 'CC', magnitude: 10, stop: { metric: 'voltage', threshold: 350 } };

function profileWith(steps: DischargeStep[], name = 'Pack A'): DischargeProfile {
  return { name, steps };
}

describe('Profile Validation', () => {
  describe('validateDischargeProfile', () => {
    it('should accept a valid profile and trim its name', () => {
      expect(validateDischargeProfile(profileWith([CC_STEP], '  Pack A '))).toEqual({
        ok: true,
        value: { name: 'Pack A', steps: [CC_STEP] },
      });
    });

    it('should return a copy of the steps', () => {
      const step: DischargeStep = { ...CC_STEP, stop: { ...CC_STEP.stop } };
      const result = validateDischargeProfile(profileWith([step]));

      expect(result.ok).toBe(true);
      if (result.ok) {
        step.magnitude = 99;
        expect(result.value.steps[0].magnitude).toBe(10);
      }
    });

    it('should require a name', () => {
      expect(validateDischargeProfile(profileWith([CC_STEP], '   '))).toEqual({
        ok: false,
        error: { field: 'name', message: 'Profile name is required' },
      });
    });

    it('should require at least one step', () => {
      expect(validateDischargeProfile(profileWith([]))).toEqual({
        ok: false,
        error: { field: 'steps', message: 'At least one step is required' },
      });
    });

    it('should limit the number of steps', () => {
      const steps = Array.from({ length: PROFILE_LIMITS.MAX_STEPS + 1 }, () => CC_STEP);
      expect(validateDischargeProfile(profileWith(steps))).toEqual({
        ok: false,
        error: { field: 'steps', message: 'Maximum 100 steps allowed' },
      });
    });

    it.each([
      [0, 'Magnitude must be greater than zero'],
      [-5, 'Magnitude must be greater than zero'],
      [NaN, 'Magnitude must be a finite number'],
      [Infinity, 'Magnitude must be a finite number'],
    ])('should reject magnitude %s', (magnitude, message) => {
      const result = validateDischargeProfile(profileWith([CC_STEP, { ...CC_STEP, magnitude }]));
      expect(result).toEqual({ ok: false, error: { field: 'steps[1].magnitude', message } });
    });

    it('should reject a negative threshold', () => {
      const step: DischargeStep = { kind: 'CV', magnitude: 300, stop: { metric: 'current', threshold: -1 } };
      expect(validateDischargeProfile(profileWith([step]))).toEqual({
        ok: false,
        error: { field: 'steps[0].stop.threshold', message: 'Stop threshold must not be negative' },
      });
    });

    it('should reject a threshold at or above the starting value', () => {
      expect(validateDischargeProfile(profileWith([CC_STEP]), { voltage: 340 })).toEqual({
        ok: false,
        error: {
          field: 'steps[0].stop.threshold',
          message: 'Stop threshold 350V must be below the starting voltage 340V',
        },
      });
      expect(validateDischargeProfile(profileWith([CC_STEP]), { voltage: 350 }).ok).toBe(false);
      expect(validateDischargeProfile(profileWith([CC_STEP]), { voltage: 400, current: 0 }).ok).toBe(true);
    });
  });
});

describe('Step Records', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('normalizeStepRecord', () => {
    it('should read the editor format', () => {
      const record = { kind: 'cp', magnitude: '2000', stopMetric: 'Voltage', stopThreshold: 300 };
      expect(normalizeStepRecord(record, 0)).toEqual({
        ok: true,
        value: { kind: 'CP', magnitude: 2000, stop: { metric: 'voltage', threshold: 300 } },
      });
    });

    it('should read the legacy format', () => {
      const record = { type: 'CC', value: 10, stop_condition_type: 'voltage', stop_condition_value: '320' };
      expect(normalizeStepRecord(record, 0)).toEqual({
        ok: true,
        value: { kind: 'CC', magnitude: 10, stop: { metric: 'voltage', threshold: 320 } },
      });
    });

    it('should default a legacy CV step to a low current stop', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(normalizeStepRecord({ type: 'CV', value: 300 }, 0)).toEqual({
        ok: true,
        value: { kind: 'CV', magnitude: 300, stop: { metric: 'current', threshold: 0.1 } },
      });
      expect(warn).toHaveBeenCalledWith('[Profile] Step 1 has no stop condition, using current <= 0.1');
    });

    it('should use a legacy stop voltage', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

      expect(normalizeStepRecord({ value: 5, stop_voltage: 310 }, 2)).toEqual({
        ok: true,
        value: { kind: 'CC', magnitude: 5, stop: { metric: 'voltage', threshold: 310 } },
      });
      expect(warn).toHaveBeenCalledWith('[Profile] Step 3 has no stop condition, using voltage <= 310');
    });

    it('should reject a non-object record', () => {
      expect(normalizeStepRecord('CC 10', 0)).toEqual({
        ok: false,
        error: { field: 'steps[0]', message: 'Step must be an object' },
      });
    });

    it('should reject an unknown kind', () => {
      expect(normalizeStepRecord({ kind: 'DC', magnitude: 1, stopMetric: 'voltage', stopThreshold: 1 }, 4)).toEqual({
        ok: false,
        error: { field: 'steps[4].kind', message: 'Unsupported step kind: DC' },
      });
    });

    it('should reject an unknown stop metric', () => {
      expect(normalizeStepRecord({ kind: 'CC', magnitude: 1, stopMetric: 'power', stopThreshold: 1 }, 0)).toEqual({
        ok: false,
        error: { field: 'steps[0].stopMetric', message: 'Unsupported stop metric: power' },
      });
    });
  });

  describe('parseProfileRecords', () => {
    it('should build a validated profile', () => {
      const records = [
        { kind: 'CC', magnitude: 10, stopMetric: 'voltage', stopThreshold: 350 },
        { kind: 'CV', magnitude: 340, stopMetric: 'current', stopThreshold: 0.5 },
      ];
      expect(parseProfileRecords('Two step', records, { voltage: 400 })).toEqual({
        ok: true,
        value: {
          name: 'Two step',
          steps: [
            CC_STEP,
            { kind: 'CV', magnitude: 340, stop: { metric: 'current', threshold: 0.5 } },
          ],
        },
      });
    });

    it('should reject non-array steps', () => {
      expect(parseProfileRecords('Bad', { kind: 'CC' })).toEqual({
        ok: false,
        error: { field: 'steps', message: 'Steps must be an array' },
      });
    });

    it('should report a non-numeric magnitude', () => {
      const result = parseProfileRecords('Bad', [
        { kind: 'CC', magnitude: 'ten', stopMetric: 'voltage', stopThreshold: 350 },
      ]);
      expect(result).toEqual({
        ok: false,
        error: { field: 'steps[0].magnitude', message: 'Magnitude must be a finite number' },
      });
    });
  });
});

describe('Profile Formatting', () => {
  it('should label steps with their units', () => {
    expect(formatStepLabel(CC_STEP)).toBe('CC 10A → 350V');
    expect(formatStepLabel({ kind: 'CP', magnitude: 2500.5, stop: { metric: 'current', threshold: 1.25 } }))
      .toBe('CP 2500.5W → 1.25A');
    expect(formatStepLabel({ kind: 'CV', magnitude: 1 / 3, stop: { metric: 'current', threshold: 0.1 } }))
      .toBe('CV 0.333333V → 0.1A');
  });

  it('should deep-freeze a copy', () => {
    const profile = profileWith([{ ...CC_STEP, stop: { ...CC_STEP.stop } }]);
    const frozen = freezeProfile(profile);

    expect(frozen).toEqual(profile);
    expect(frozen).not.toBe(profile);
    expect(Object.isFrozen(frozen)).toBe(true);
    expect(Object.isFrozen(frozen.steps)).toBe(true);
    expect(Object.isFrozen(frozen.steps[0])).toBe(true);
    expect(Object.isFrozen(frozen.steps[0].stop)).toBe(true);
    expect(Object.isFrozen(profile.steps[0])).toBe(false);
  });
});
