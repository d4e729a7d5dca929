/**
 * Zod schemas for records crossing the collector/core boundary.
 *
 * Unlike report data, metric records are never defaulted: a malformed
 * record is a collector bug and fails the run at this single point.
 */

import { z } from 'zod';
import { InputContractError } from './errors.js';
import type { RawRepositoryMetrics } from './types/metrics.js';
import type { HistorySnapshot } from './history/types.js';

export const FULL_NAME_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const count = z.number().int().nonnegative();

const ContributorActivitySchema = z.object({
  id: z.string().min(1),
  commits: count,
});

export const RawRepositoryMetricsSchema = z
  .object({
    fullName: z.string().regex(FULL_NAME_PATTERN, 'expected owner/repo'),
    starsTotal: count,
    forksTotal: count,
    commits14d: count.optional(),
    featureCommits14d: count.optional(),
    starsGained14d: z.number().int().optional(),
    contributors30d: z.array(ContributorActivitySchema).optional(),
    primaryLanguage: z.string().nullable().optional(),
    topics: z.array(z.string()).optional(),
    description: z.string().nullable().optional(),
    url: z.string().url().optional(),
  })
  .refine((m) => (m.featureCommits14d ?? 0) <= (m.commits14d ?? 0), {
    message: 'feature commits exceed commits in the window',
    path: ['featureCommits14d'],
  });

export const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'expected YYYY-MM-DD')
  .refine(isCalendarDate, 'not a calendar date');

export const HistorySnapshotSchema = z.object({
  date: IsoDateSchema,
  entries: z.record(z.number().min(0).max(10)),
});

/**
 * Validate one raw metrics record.
 * Throws InputContractError listing every schema issue.
 */
export function parseRawMetrics(input: unknown): RawRepositoryMetrics {
  const result = RawRepositoryMetricsSchema.safeParse(input);
  if (!result.success) {
    const fullName = identityOf(input);
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join('.') : '(record)'}: ${i.message}`
    );
    throw new InputContractError(
      `Invalid metrics for ${fullName ?? 'unidentified repository'}: ${issues.join('; ')}`,
      fullName,
      issues
    );
  }
  return result.data;
}

/**
 * Validate a whole batch. The first bad record aborts; a repeated
 * fullName is a contract violation as well.
 */
export function parseRawBatch(inputs: readonly unknown[]): RawRepositoryMetrics[] {
  const seen = new Set<string>();
  const records: RawRepositoryMetrics[] = [];

  for (const input of inputs) {
    const record = parseRawMetrics(input);
    if (seen.has(record.fullName)) {
      throw new InputContractError(`Duplicate repository ${record.fullName}`, record.fullName, [
        'fullName: duplicate in batch',
      ]);
    }
    seen.add(record.fullName);
    records.push(record);
  }

  return records;
}

export function isIsoDate(value: string): boolean {
  return IsoDateSchema.safeParse(value).success;
}

/** Throws InputContractError unless value is a YYYY-MM-DD calendar date. */
export function assertIsoDate(value: string): void {
  if (!isIsoDate(value)) {
    throw new InputContractError(`Invalid run date "${value}"`, null, [
      'date: expected YYYY-MM-DD',
    ]);
  }
}

/** Validate a snapshot read back from storage. */
export function parseHistorySnapshot(input: unknown): HistorySnapshot {
  return HistorySnapshotSchema.parse(input);
}

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function identityOf(input: unknown): string | null {
  if (typeof input === 'object' && input !== null && 'fullName' in input) {
    const { fullName } = input;
    return typeof fullName === 'string' && fullName.length > 0 ? fullName : null;
  }
  return null;
}
