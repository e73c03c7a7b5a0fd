/**
 * Action Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { validateAction, NO_ACTION } from '../../src/engine/action';
import { InvalidAction } from '../../src/engine/errors';

describe('validateAction', () => {
  it('fills omitted fields with the do-nothing defaults', () => {
    expect(validateAction({})).toEqual(NO_ACTION);
    expect(validateAction({ fire: true })).toEqual({ thrust: 0, turnRate: 0, fire: true });
  });

  it('accepts values at the range limits', () => {
    expect(validateAction({ thrust: -480, turnRate: 180 })).toEqual({ thrust: -480, turnRate: 180, fire: false });
  });

  it('rejects out-of-range values instead of clamping', () => {
    expect(() => validateAction({ thrust: 481 })).toThrow(InvalidAction);
    expect(() => validateAction({ turnRate: -200 })).toThrow('turnRate -200 outside [-180, 180]');
  });

  it('rejects non-finite numbers and wrong types', () => {
    expect(() => validateAction({ thrust: Number.NaN })).toThrow('thrust must be a finite number');
    expect(() => validateAction({ turnRate: '90' })).toThrow('turnRate must be a finite number');
    expect(() => validateAction({ fire: 1 })).toThrow('fire must be a boolean');
  });

  it('rejects unknown fields and non-objects', () => {
    expect(() => validateAction({ hyperspace: true })).toThrow('unknown action field "hyperspace"');
    expect(() => validateAction(null)).toThrow(InvalidAction);
    expect(() => validateAction([1, 2, 3])).toThrow(InvalidAction);
  });
});
