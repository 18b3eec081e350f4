import { newPipelineEventId, type BatchId, type PipelineEventId } from "@photorelay/shared";

export type PipelineEventType =
  | "batch.staged"
  | "batch.transfer.started"
  | "batch.transfer.progress"
  | "batch.transfer.aborted"
  | "batch.awaiting_import"
  | "batch.poll.status"
  | "batch.imported"
  | "batch.processed"
  | "batch.pending"
  | "batch.failed"
  | "batch.purged"
  | "destination.waking"
  | "cleanup.orphan_removed"
  | "cleanup.sweep";

export interface PipelineEvent {
  event_id: PipelineEventId;
  event_type: PipelineEventType;
  batch_id: BatchId | null;
  occurred_at: string;
  data: Record<string, unknown>;
}

export const DEFAULT_EVENT_CAPACITY = 1000;

/** Bounded in-memory feed; the oldest events drop off once full. */
export class PipelineEventLog {
  private readonly events: PipelineEvent[] = [];

  constructor(
    private readonly capacity: number = DEFAULT_EVENT_CAPACITY,
    private readonly nowIso: () => string = () => new Date().toISOString(),
  ) {}

  append(event_type: PipelineEventType, batch_id: BatchId | null, data: Record<string, unknown> = {}): PipelineEvent {
    const event: PipelineEvent = {
      event_id: newPipelineEventId(),
      event_type,
      batch_id,
      occurred_at: this.nowIso(),
      data,
    };
    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity);
    }
    return event;
  }

  /**
   * Events strictly after `after`. Ids are monotonic, so an id that already
   * dropped off still returns everything newer.
   */
  list(after?: string, limit = 200): PipelineEvent[] {
    const bounded = Math.min(Math.max(limit, 1), this.capacity);
    const newer = after ? this.events.filter((e) => e.event_id > after) : this.events;
    return newer.slice(0, bounded);
  }

  get size(): number {
    return this.events.length;
  }
}

/** Emits at most one event per five-percent step of progress. */
export class ProgressReporter {
  private sent = 0;
  private lastStep = -1;

  constructor(
    private readonly totalBytes: number,
    private readonly emit: (percent: number, sentBytes: number) => void,
  ) {}

  add(bytes: number): void {
    this.sent += bytes;
    const percent = this.totalBytes > 0 ? Math.min(100, Math.floor((this.sent / this.totalBytes) * 100)) : 100;
    const step = Math.floor(percent / 5);
    if (step > this.lastStep) {
      this.lastStep = step;
      this.emit(step * 5, this.sent);
    }
  }
}
