/**
 * DDM Status Runtime Host — Status History
 *
 * Every refresh appends one JSONL event to `<home>/logs/status.jsonl`:
 *
 *   {"event_id":"01J…","timestamp":"2026-03-14T09:00:00.000Z",
 *    "installed_version":"26.2","required_version":"26.3",
 *    "is_up_to_date":false,"days_remaining":3,"disk_ok":true,"uptime_ok":true}
 *
 * required_version and days_remaining are null when no enforcement is in
 * effect or the deadline could not be read.
 *
 * Reading is tolerant of the damage an append-only file picks up:
 *   - lines that are not JSON or do not match the event shape are dropped and counted
 *   - a repeated event_id keeps its first occurrence
 *   - a final line with no newline is treated as a torn write and dropped
 *   - output is sorted by (timestamp, event_id)
 */

import { z } from 'zod';
import type { StatusSnapshot } from '@ddm-status/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid as defaultUlid } from './ulid.js';
import type { UlidGenerator } from './ulid.js';

export const STATUS_LOG = 'status.jsonl';

// ---------------------------------------------------------------------------
// Event shape
// ---------------------------------------------------------------------------

export const StatusEventSchema = z.object({
  event_id: z.string().length(26),
  timestamp: z.string(),
  installed_version: z.string(),
  required_version: z.string().nullable(),
  is_up_to_date: z.boolean(),
  days_remaining: z.number().int().nullable(),
  disk_ok: z.boolean(),
  uptime_ok: z.boolean(),
});

export type StatusEvent = z.infer<typeof StatusEventSchema>;

/** Project a snapshot onto the fields recorded in the history. */
export function toStatusEvent(snapshot: StatusSnapshot, eventId: string): StatusEvent {
  const { enforcement } = snapshot;
  return {
    event_id: eventId,
    timestamp: snapshot.collectedAt,
    installed_version: snapshot.installedVersion,
    required_version: enforcement.record?.requiredVersion ?? null,
    is_up_to_date: enforcement.isUpToDate,
    days_remaining: enforcement.daysRemaining,
    disk_ok: snapshot.disk.ok,
    uptime_ok: snapshot.uptime.ok,
  };
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

export class StatusHistorySink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly nextId: UlidGenerator = defaultUlid,
  ) {}

  /** Append the snapshot as one event and return what was written. */
  append(snapshot: StatusSnapshot): StatusEvent {
    const event = toStatusEvent(snapshot, this.nextId());
    this.stateIO.appendLine(STATUS_LOG, JSON.stringify(event));
    return event;
  }
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

export interface StatusHistoryStats {
  /** Non-empty complete lines examined. */
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON or did not match the event shape. */
  readonly invalidLines: number;
  readonly partialTrailingLine: boolean;
}

export interface StatusHistory {
  readonly events: ReadonlyArray<StatusEvent>;
  readonly stats: StatusHistoryStats;
}

/**
 * Parse raw status log content. No I/O; pair with StateIO.readLogRaw().
 */
export function readStatusHistory(rawContent: string): StatusHistory {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  const seen = new Set<string>();
  const events: StatusEvent[] = [];
  let duplicates = 0;
  let invalidLines = 0;

  for (const line of lines) {
    const event = parseEventLine(line);
    if (event === null) {
      invalidLines++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  events.sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id !== b.event_id) return a.event_id < b.event_id ? -1 : 1;
    return 0;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      invalidLines,
      partialTrailingLine,
    },
  };
}

/** Most recent `limit` events, oldest first. */
export function latestEvents(history: StatusHistory, limit: number): ReadonlyArray<StatusEvent> {
  if (limit <= 0) return [];
  return history.events.slice(-limit);
}

function parseEventLine(line: string): StatusEvent | null {
  let document: unknown;
  try {
    document = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = StatusEventSchema.safeParse(document);
  return parsed.success ? parsed.data : null;
}
