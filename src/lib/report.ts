import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { describeReason } from './buybox-engine.js';
import { totalPrice } from './offer-normalizer.js';
import type { AnalysisResult } from './batch-orchestrator.js';

/** Receives the final ordered results; rendering is entirely its concern. */
export interface ReportWriter {
  write(results: readonly AnalysisResult[]): Promise<void>;
}

export const REPORT_COLUMNS = [
  'ASIN',
  'Product Name',
  'Buy Box Winner',
  'Price',
  'Shipping',
  'Total Price',
  'Is FBA',
  'Is Prime',
  'Seller Rating',
  'Reasons',
  'Total Offers',
  'Analyzed At',
  'Error',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

const money = (n: number | undefined) => (n === undefined ? '' : n.toFixed(2));
const yesNo = (b: boolean | undefined) => (b === undefined ? '' : b ? 'Yes' : 'No');

export function toReportRow(result: AnalysisResult): Record<ReportColumn, string> {
  const w = result.winningOffer;
  return {
    ASIN: result.productId,
    'Product Name': result.productName ?? '',
    'Buy Box Winner': w ? w.sellerId : 'No Winner',
    Price: money(w?.listingPrice),
    Shipping: money(w?.shippingPrice),
    'Total Price': money(w ? totalPrice(w) : undefined),
    'Is FBA': yesNo(w?.isFulfilledByPlatform),
    'Is Prime': yesNo(w?.isPrimeEligible),
    'Seller Rating': w?.sellerFeedbackRating === undefined ? '' : `${w.sellerFeedbackRating.toFixed(0)}%`,
    Reasons: result.reasons.map(describeReason).join('; '),
    'Total Offers': String(result.totalOfferCount),
    'Analyzed At': result.analyzedAt,
    Error: result.failure ? `${result.failure.kind}: ${result.failure.message}` : '',
  };
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function resultsToCSV(results: readonly AnalysisResult[]): string {
  const lines: string[] = [REPORT_COLUMNS.join(',')];
  for (const result of results) {
    const row = toReportRow(result);
    lines.push(REPORT_COLUMNS.map((col) => quote(row[col])).join(','));
  }
  return lines.join('\n');
}

export function createCsvFileWriter(filePath: string): ReportWriter {
  return {
    async write(results) {
      const dir = path.dirname(filePath);
      if (dir) await mkdir(dir, { recursive: true });
      await writeFile(filePath, resultsToCSV(results) + '\n', 'utf8');
    },
  };
}
