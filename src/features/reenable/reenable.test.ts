import { isInCooldown, hasMinRiseSince } from './reenable';

const MINUTE = 60000;

describe('reenable', () => {
  describe('isInCooldown', () => {
    it('should be true before the cooldown elapses', () => {
      expect(isInCooldown(0, 59 * MINUTE, 60)).toBe(true);
    });

    it('should end exactly at the cooldown', () => {
      expect(isInCooldown(0, 60 * MINUTE, 60)).toBe(false);
    });

    it('should never hold with a zero cooldown', () => {
      expect(isInCooldown(1000, 1000, 0)).toBe(false);
    });
  });

  describe('hasMinRiseSince', () => {
    it('should be false for fewer than two values', () => {
      expect(hasMinRiseSince([], 0)).toBe(false);
      expect(hasMinRiseSince([20], 0)).toBe(false);
    });

    it('should be true for a rise from the first value', () => {
      expect(hasMinRiseSince([20, 21], 1)).toBe(true);
    });

    it('should measure from the lowest earlier value', () => {
      expect(hasMinRiseSince([22, 19, 20.5], 1.5)).toBe(true);
    });

    it('should ignore a drop followed by a small recovery', () => {
      expect(hasMinRiseSince([22, 19, 19.5, 18, 18.9], 1)).toBe(false);
    });

    it('should not count a fall as a rise', () => {
      expect(hasMinRiseSince([25, 24, 23], 1)).toBe(false);
    });

    it('should accept a flat pair with a zero minimum rise', () => {
      expect(hasMinRiseSince([25, 25], 0)).toBe(true);
      expect(hasMinRiseSince([25, 24], 0)).toBe(false);
    });
  });
});
