import { describe, it, expect } from 'vitest';
import {
  COD_METHOD_ID,
  exceedsLimit,
  getPaymentMethod,
  listPaymentMethods,
} from '../src/config/paymentMethods.js';

describe('Payment Methods', () => {
  it('looks up methods by id', () => {
    expect(getPaymentMethod('qris')?.fee).toBe(0);
    expect(getPaymentMethod('unknown')).toBeNull();
  });

  it('lists every method with a unique id', () => {
    const ids = listPaymentMethods().map((method) => method.id);
    expect(ids).toEqual(['qris', 'dana', 'ovo', 'bank_transfer', 'debit_card', 'cod']);
  });

  it('gives cash on delivery a fee and a ceiling', () => {
    const cod = getPaymentMethod(COD_METHOD_ID);
    expect(cod?.fee).toBe(15_000);
    expect(cod?.maxAmount).toBe(5_000_000);
  });

  describe('exceedsLimit', () => {
    it('rejects totals strictly above the ceiling', () => {
      const cod = getPaymentMethod(COD_METHOD_ID);
      if (!cod) throw new Error('cod missing');

      expect(exceedsLimit(cod, 5_000_000)).toBe(false);
      expect(exceedsLimit(cod, 5_000_001)).toBe(true);
      expect(exceedsLimit(cod, 6_000_000)).toBe(true);
    });

    it('never limits methods without a ceiling', () => {
      const transfer = getPaymentMethod('bank_transfer');
      if (!transfer) throw new Error('bank_transfer missing');

      expect(exceedsLimit(transfer, 1_000_000_000)).toBe(false);
    });
  });
});
