import { BackupDescriptor } from "../../models/sync.model";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionPolicyConfig {
  maxDailyBackups: number;
  maxMonthlyBackups: number;
  maxYearlyBackups: number;
  maxAgeDays: number;
}

export const RetentionPresets = {
  default: {
    maxDailyBackups: 30,
    maxMonthlyBackups: 12,
    maxYearlyBackups: 5,
    maxAgeDays: 365 * 2,
  },
  conservative: {
    maxDailyBackups: 60,
    maxMonthlyBackups: 24,
    maxYearlyBackups: 10,
    maxAgeDays: 365 * 5,
  },
  minimal: {
    maxDailyBackups: 7,
    maxMonthlyBackups: 6,
    maxYearlyBackups: 2,
    maxAgeDays: 365,
  },
} satisfies Record<string, RetentionPolicyConfig>;

export type RetentionPresetName = keyof typeof RetentionPresets;

type BucketKey = (descriptor: BackupDescriptor) => string;

// UTC calendar buckets
const dayKey: BucketKey = (d) => d.createdAt.toISOString().slice(0, 10);
const monthKey: BucketKey = (d) => d.createdAt.toISOString().slice(0, 7);
const yearKey: BucketKey = (d) => d.createdAt.toISOString().slice(0, 4);

const newestFirst = (a: BackupDescriptor, b: BackupDescriptor): number =>
  b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id);

interface BucketRule {
  /** Everything but the newest entry of each bucket beyond the retained count */
  marked: Set<string>;
  /** Newest entry of each retained bucket */
  heads: Set<string>;
}

const applyBucketRule = (
  descriptors: BackupDescriptor[],
  keyOf: BucketKey,
  keep: number,
): BucketRule => {
  const buckets = new Map<string, BackupDescriptor[]>();
  for (const descriptor of descriptors) {
    const key = keyOf(descriptor);
    const bucket = buckets.get(key) ?? [];
    bucket.push(descriptor);
    buckets.set(key, bucket);
  }

  const marked = new Set<string>();
  const heads = new Set<string>();
  const orderedKeys = [...buckets.keys()].sort((a, b) => b.localeCompare(a));

  orderedKeys.forEach((key, position) => {
    const bucket = (buckets.get(key) ?? []).sort(newestFirst);
    if (position < keep) {
      if (bucket.length > 0) heads.add(bucket[0].id);
      return;
    }
    bucket.slice(1).forEach((descriptor) => marked.add(descriptor.id));
  });

  return { marked, heads };
};

/**
 * Decide which backups to delete. Daily, monthly, yearly and age rules
 * run independently and their results are unioned; an entry marked by the
 * monthly or yearly rule survives when it heads a bucket retained by a
 * finer rule. Entries older than `maxAgeDays` are always deleted.
 *
 * Returned oldest first.
 */
export const prune = (
  descriptors: readonly BackupDescriptor[],
  policy: RetentionPolicyConfig,
  now: Date,
): BackupDescriptor[] => {
  const all = [...descriptors];
  const daily = applyBucketRule(all, dayKey, policy.maxDailyBackups);
  const monthly = applyBucketRule(all, monthKey, policy.maxMonthlyBackups);
  const yearly = applyBucketRule(all, yearKey, policy.maxYearlyBackups);
  const cutoff = now.getTime() - policy.maxAgeDays * DAY_MS;

  const doomed = new Set<string>(daily.marked);
  for (const id of monthly.marked) {
    if (!daily.heads.has(id)) doomed.add(id);
  }
  for (const id of yearly.marked) {
    if (!daily.heads.has(id) && !monthly.heads.has(id)) doomed.add(id);
  }
  for (const descriptor of all) {
    if (descriptor.createdAt.getTime() < cutoff) doomed.add(descriptor.id);
  }

  return all
    .filter((descriptor) => doomed.has(descriptor.id))
    .sort((a, b) => -newestFirst(a, b));
};
