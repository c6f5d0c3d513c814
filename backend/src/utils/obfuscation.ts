import { FIELD } from '@formveil/shared';
import { digestHex } from './crypto.js';

/**
 * Wire name for a logical field: "ID" + SHA-512(name + "_" + secret + bucket).
 *
 * Pure in its three inputs. An empty secret still yields a stable id, which
 * anyone can recompute, so a missing secret is a deployment mistake rather
 * than something this function refuses.
 */
export function deriveWireId(logicalName: string, secretKey: string, bucket: string): string {
  return FIELD.WIRE_ID_PREFIX + digestHex('sha512', `${logicalName}_${secretKey}${bucket}`);
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function bucketFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/** Hour-truncated "YYYY-MM-DD HH" of `date` as seen in `timeZone`. */
export function formatTimeBucket(date: Date, timeZone = 'UTC'): string {
  const parts = bucketFormatter(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}`;
}

export type CandidateBuckets = readonly [current: string] | readonly [current: string, previous: string];

/**
 * Buckets a submission is checked against, most recent first. The previous
 * hour is only listed when its bucket string differs from the current one,
 * so no bucket is ever checked twice.
 */
export function candidateBuckets(now: Date, timeZone = 'UTC'): CandidateBuckets {
  const current = formatTimeBucket(now, timeZone);
  const previous = formatTimeBucket(new Date(now.getTime() - FIELD.BUCKET_SECONDS * 1000), timeZone);
  return previous === current ? [current] : [current, previous];
}
