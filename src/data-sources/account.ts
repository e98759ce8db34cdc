import { InputError } from '@/plan/errors.ts';
import type { AccountInfoProvider } from '@/plan/capabilities.ts';

/** Equity comes from the caller; there is no brokerage account behind it. */
export const createExplicitAccount = (): AccountInfoProvider => ({
  getEquity: async (explicitValue) => {
    if (explicitValue === null || explicitValue === undefined) {
      throw new InputError('account equity is required');
    }
    if (!Number.isFinite(explicitValue) || explicitValue <= 0) {
      throw new InputError(`account equity must be a positive number, got ${explicitValue}`);
    }
    return explicitValue;
  },
});
