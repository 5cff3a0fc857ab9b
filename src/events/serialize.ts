import type { EventRecord, LedgerEvent, SerializedEventRecord } from './types.js';

export function serializeEvent(event: LedgerEvent): SerializedEventRecord['event'] {
  const out: SerializedEventRecord['event'] = { type: event.type };
  for (const [key, value] of Object.entries(event)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}

export function serializeEventRecord(record: EventRecord): SerializedEventRecord {
  return {
    sequence: record.sequence,
    emittedAt: record.emittedAt,
    event: serializeEvent(record.event),
  };
}
