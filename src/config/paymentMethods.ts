import type { PaymentMethod } from '../models/types.js';

export const COD_METHOD_ID = 'cod';

/**
 * Available payment methods. Fees and ceilings are in display currency.
 */
export const PAYMENT_METHODS: readonly PaymentMethod[] = [
  {
    id: 'qris',
    name: 'QRIS (QR Code Indonesian Standard)',
    description: 'Scan QR code with any e-wallet or bank app',
    fee: 0,
    supported: ['All Indonesian Banks', 'E-wallets'],
  },
  {
    id: 'dana',
    name: 'Dana E-Wallet',
    description: 'Instant payment via Dana app',
    fee: 0,
    phoneNumber: '0800-0000-0001',
  },
  {
    id: 'ovo',
    name: 'OVO E-Wallet',
    description: 'Pay via OVO app or QR',
    fee: 0,
    phoneNumber: '0800-0000-0002',
  },
  {
    id: 'bank_transfer',
    name: 'Bank Transfer',
    description: 'Manual transfer to bank account',
    fee: 0,
    accounts: [
      { bank: 'BCA', account: '0000000001', holder: 'STOREFRONT DEMO' },
      { bank: 'Mandiri', account: '0000000002', holder: 'STOREFRONT DEMO' },
      { bank: 'BNI', account: '0000000003', holder: 'STOREFRONT DEMO' },
    ],
  },
  {
    id: 'debit_card',
    name: 'Debit Card',
    description: 'Visa/Mastercard debit card',
    fee: 0,
    supported: ['Visa', 'Mastercard', 'JCB'],
  },
  {
    id: COD_METHOD_ID,
    name: 'Cash on Delivery (COD)',
    description: 'Pay cash when item arrives',
    fee: 15_000,
    maxAmount: 5_000_000,
  },
];

export function listPaymentMethods(): readonly PaymentMethod[] {
  return PAYMENT_METHODS;
}

export function getPaymentMethod(id: string): PaymentMethod | null {
  return PAYMENT_METHODS.find((method) => method.id === id) ?? null;
}

/**
 * True when the method has a ceiling and the total (fee included) is above it
 */
export function exceedsLimit(method: PaymentMethod, totalWithFee: number): boolean {
  return method.maxAmount !== undefined && totalWithFee > method.maxAmount;
}
