/**
 * Shared transaction fixtures
 *
 * Eight hand-made rows. Totals: amount 2550, fraud 2 (t3, t7), failed 2
 * (t2, t7), success 5.
 */

import type { GroupRow, Transaction, TransactionDataset } from '../../../common/types.js';
import { DatasetError } from '../../../common/errors.js';

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 't0',
    timestamp: '2024-03-04T10:00:00.000Z',
    transaction_type: 'P2P',
    merchant_category: 'Food',
    amount: 100,
    transaction_status: 'SUCCESS',
    sender_age_group: '26-35',
    sender_state: 'Delhi',
    sender_bank: 'SBI',
    receiver_age_group: '26-35',
    receiver_bank: 'HDFC',
    device_type: 'Android',
    network_type: '4G',
    fraud_flag: false,
    hour_of_day: 10,
    day_of_week: 0,
    is_weekend: false,
    ...overrides,
  };
}

export const SAMPLE_TRANSACTIONS: Transaction[] = [
  makeTransaction({
    id: 't1', merchant_category: 'Food', amount: 100, sender_age_group: '18-25',
    sender_state: 'Delhi', sender_bank: 'SBI', receiver_bank: 'HDFC',
    device_type: 'Android', network_type: '4G', hour_of_day: 9, day_of_week: 0,
  }),
  makeTransaction({
    id: 't2', merchant_category: 'Food', amount: 300, transaction_status: 'FAILED',
    sender_state: 'Delhi', sender_bank: 'HDFC', receiver_bank: 'SBI',
    device_type: 'iOS', network_type: '5G', hour_of_day: 14, day_of_week: 1,
  }),
  makeTransaction({
    id: 't3', merchant_category: 'Travel', amount: 1000, fraud_flag: true,
    sender_state: 'Maharashtra', sender_bank: 'SBI', receiver_bank: 'ICICI',
    device_type: 'Android', network_type: 'WiFi', hour_of_day: 19, day_of_week: 5, is_weekend: true,
  }),
  makeTransaction({
    id: 't4', merchant_category: 'Travel', amount: 500, sender_age_group: '36-45',
    sender_state: 'Karnataka', sender_bank: 'ICICI', receiver_bank: 'SBI',
    device_type: 'Web', network_type: '4G', hour_of_day: 22, day_of_week: 6, is_weekend: true,
  }),
  makeTransaction({
    id: 't5', merchant_category: 'Grocery', amount: 50, sender_age_group: '18-25',
    sender_state: 'Delhi', sender_bank: 'SBI', receiver_bank: 'HDFC',
    device_type: 'Android', network_type: '4G', hour_of_day: 9, day_of_week: 2,
  }),
  makeTransaction({
    id: 't6', merchant_category: 'Grocery', amount: 150, transaction_status: 'PENDING', sender_age_group: '18-25',
    sender_state: 'Maharashtra', sender_bank: 'HDFC', receiver_bank: 'SBI',
    device_type: 'iOS', network_type: '4G', hour_of_day: 14, day_of_week: 3,
  }),
  makeTransaction({
    id: 't7', merchant_category: 'Shopping', amount: 250, transaction_status: 'FAILED', fraud_flag: true,
    sender_state: 'Karnataka', sender_bank: 'SBI', receiver_bank: 'HDFC',
    device_type: 'Android', network_type: '5G', hour_of_day: 20, day_of_week: 4,
  }),
  makeTransaction({
    id: 't8', merchant_category: 'Food', amount: 200, sender_age_group: '36-45',
    sender_state: 'Maharashtra', sender_bank: 'HDFC', receiver_bank: 'ICICI',
    device_type: 'iOS', network_type: 'WiFi', hour_of_day: 9, day_of_week: 6, is_weekend: true,
  }),
];

/**
 * Dataset whose every call fails
 */
export class FailingDataset implements TransactionDataset {
  async filter(): Promise<Transaction[]> {
    throw new DatasetError('dataset unavailable');
  }

  async aggregate(): Promise<Record<string, number>> {
    throw new DatasetError('dataset unavailable');
  }

  async groupBy(): Promise<GroupRow[]> {
    throw new DatasetError('dataset unavailable');
  }
}
