import { evaluateArming, isArmingConfigured } from './arming';
import type { ArmingConfig } from '$types/config';

const EVENING = new Date(2024, 5, 1, 18, 30).getTime();
const MORNING = new Date(2024, 5, 1, 9, 15).getTime();

describe('arming', () => {
  describe('isArmingConfigured', () => {
    it('should be false when neither condition is set', () => {
      expect(isArmingConfigured({ temperatureDelta: null, time: null })).toBe(false);
    });

    it('should be true for either condition', () => {
      expect(isArmingConfigured({ temperatureDelta: 2, time: null })).toBe(true);
      expect(isArmingConfigured({ temperatureDelta: null, time: { hours: 17, minutes: 0 } })).toBe(true);
    });
  });

  describe('evaluateArming', () => {
    const byDelta: ArmingConfig = { temperatureDelta: 2, time: null };
    const byTime: ArmingConfig = { temperatureDelta: null, time: { hours: 17, minutes: 0 } };

    it('should arm when outdoor reaches indoor plus delta (inclusive)', () => {
      const result = evaluateArming({ indoorTemp: 22, outdoorTemp: 24, now: MORNING, armed: false }, byDelta);

      expect(result).toEqual({
        configured: true,
        armByTemp: true,
        armByTime: false,
        shouldArm: true,
        reasons: ['outdoor 24.0°C >= indoor 22.0°C + 2.0°C']
      });
    });

    it('should not arm just below indoor plus delta', () => {
      const result = evaluateArming({ indoorTemp: 22, outdoorTemp: 23.9, now: MORNING, armed: false }, byDelta);
      expect(result.armByTemp).toBe(false);
      expect(result.shouldArm).toBe(false);
    });

    it('should arm once the time of day has passed', () => {
      const result = evaluateArming({ indoorTemp: 22, outdoorTemp: 10, now: EVENING, armed: false }, byTime);

      expect(result.armByTime).toBe(true);
      expect(result.shouldArm).toBe(true);
      expect(result.reasons).toEqual(['time of day >= 17:00']);
    });

    it('should arm exactly at the configured minute', () => {
      const atFive = new Date(2024, 5, 1, 17, 0).getTime();
      expect(evaluateArming({ indoorTemp: 22, outdoorTemp: 10, now: atFive, armed: false }, byTime).armByTime).toBe(true);
    });

    it('should not arm before the configured time', () => {
      const result = evaluateArming({ indoorTemp: 22, outdoorTemp: 10, now: MORNING, armed: false }, byTime);
      expect(result.shouldArm).toBe(false);
      expect(result.reasons).toEqual([]);
    });

    it('should report both reasons when both hold', () => {
      const result = evaluateArming(
        { indoorTemp: 20, outdoorTemp: 25, now: EVENING, armed: false },
        { temperatureDelta: 2, time: { hours: 17, minutes: 0 } }
      );
      expect(result.reasons).toEqual(['outdoor 25.0°C >= indoor 20.0°C + 2.0°C', 'time of day >= 17:00']);
    });

    it('should not ask to arm an already armed state', () => {
      const result = evaluateArming({ indoorTemp: 22, outdoorTemp: 30, now: EVENING, armed: true }, byDelta);
      expect(result.armByTemp).toBe(true);
      expect(result.shouldArm).toBe(false);
    });

    it('should never arm without configuration', () => {
      const result = evaluateArming(
        { indoorTemp: 22, outdoorTemp: 30, now: EVENING, armed: false },
        { temperatureDelta: null, time: null }
      );
      expect(result.configured).toBe(false);
      expect(result.shouldArm).toBe(false);
    });
  });
});
