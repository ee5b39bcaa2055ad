// Signal serialization
// Wire records use snake_case keys and ISO-8601 timestamps

import { z } from 'zod';
import { InvalidInputError } from '../shared/errors';
import { Signal } from '../shared/types';

export const SignalRecordSchema = z.object({
  signal_id: z.string().min(1),
  text: z.string(),
  timestamp: z.string(),
  source: z.string(),
  domain: z.string(),
  subdomain: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export type SignalRecord = z.infer<typeof SignalRecordSchema>;

export function signalToRecord(signal: Signal): SignalRecord {
  return {
    signal_id: signal.signalId,
    text: signal.text,
    timestamp: signal.timestamp.toISOString(),
    source: signal.source,
    domain: signal.domain,
    subdomain: signal.subdomain,
    metadata: signal.metadata,
  };
}

export function signalFromRecord(input: unknown): Signal {
  const parsed = SignalRecordSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') || 'record' : 'record';
    throw new InvalidInputError(`Malformed signal record (${where}): ${issue?.message ?? 'invalid'}`);
  }

  const record = parsed.data;
  const timestamp = new Date(record.timestamp);
  if (Number.isNaN(timestamp.getTime())) {
    throw new InvalidInputError(`Malformed signal record ${record.signal_id}: bad timestamp "${record.timestamp}"`);
  }

  return {
    signalId: record.signal_id,
    text: record.text,
    timestamp,
    source: record.source,
    domain: record.domain,
    subdomain: record.subdomain,
    metadata: record.metadata ?? {},
  };
}
