import { z } from 'zod';
import type { DataQualityNote, InsiderTransaction, RawInsiderTransaction } from '../types';
import { isIsoDate } from './windowing';

/** Fields the engine cannot cluster or score without. */
const RequiredFieldsSchema = z.object({
  accessionNumber: z.string().min(1, 'missing accession number'),
  ticker: z.string().min(1, 'missing ticker'),
  insiderCIK: z.string().min(1, 'missing insider CIK'),
  transactionDate: z
    .string({ required_error: 'missing transaction date', invalid_type_error: 'missing transaction date' })
    .refine(isIsoDate, 'unparseable transaction date'),
  shares: z
    .number({ required_error: 'missing shares', invalid_type_error: 'missing shares' })
    .finite()
    .positive('non-positive shares'),
  pricePerShare: z
    .number({ required_error: 'missing price', invalid_type_error: 'missing price' })
    .finite()
    .nonnegative('negative price'),
});

export interface ValidationResult {
  valid: InsiderTransaction[];
  notes: DataQualityNote[];
}

export function validateTransactions(records: RawInsiderTransaction[]): ValidationResult {
  const valid: InsiderTransaction[] = [];
  const notes: DataQualityNote[] = [];

  for (const record of records) {
    const parsed = RequiredFieldsSchema.safeParse(record);
    if (!parsed.success) {
      const reasons = parsed.error.issues.map((issue) => issue.message).join(', ');
      notes.push({
        code: 'MALFORMED_RECORD',
        ticker: record.ticker || undefined,
        accessionNumber: record.accessionNumber || undefined,
        message: `Excluded ${record.insiderName || 'unknown insider'} transaction: ${reasons}`,
      });
      continue;
    }

    const { shares, pricePerShare, transactionDate } = parsed.data;
    valid.push({
      accessionNumber: record.accessionNumber,
      ticker: record.ticker.toUpperCase(),
      companyName: record.companyName,
      insiderCIK: record.insiderCIK,
      insiderName: record.insiderName,
      insiderTitle: record.insiderTitle ?? '',
      roles: { ...record.roles },
      transactionType: record.transactionType,
      transactionDate,
      shares,
      pricePerShare,
      totalValue: shares * pricePerShare,
      filedAt: record.filedAt,
    });
  }

  return { valid, notes };
}
