// Progress tracking utilities
import type { ProgressEvent } from '../models';

export type ProgressHandler = (event: ProgressEvent) => void;

/**
 * Single-owner queue of progress messages. Emitters push from any task;
 * the owner either subscribes once or drains what is buffered.
 */
export class ProgressChannel {
  private buffered: ProgressEvent[] = [];
  private handler: ProgressHandler | null = null;

  emit(source: string, message: string): void {
    const event: ProgressEvent = { source, message, at: new Date() };
    if (this.handler) {
      this.handler(event);
    } else {
      this.buffered.push(event);
    }
  }

  /**
   * Registers the one consumer and replays everything buffered so far
   */
  subscribe(handler: ProgressHandler): void {
    if (this.handler) {
      throw new Error('ProgressChannel already has a subscriber');
    }
    this.handler = handler;

    const pending = this.drain();
    pending.forEach(event => handler(event));
  }

  drain(): ProgressEvent[] {
    const pending = this.buffered;
    this.buffered = [];
    return pending;
  }
}

/**
 * Channel that prints every event to the console, used by scripts
 */
export function createConsoleProgressChannel(): ProgressChannel {
  const channel = new ProgressChannel();
  channel.subscribe(event => {
    console.log(`[${event.source}] ${event.message}`);
  });
  return channel;
}

/**
 * Formats milliseconds as hh:mm:ss
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(Math.floor(ms / 1000), 0);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return [hours, minutes, seconds].map(part => part.toString().padStart(2, '0')).join(':');
}

export interface SendProgressSnapshot {
  sent: number;
  target: number;
  elapsedMs: number;
  avgSeconds: number;
  etaMs: number;
  remaining: number;
  percentRemaining: number;
}

/**
 * Computes send statistics; target is the larger of the eligible count and the list size
 */
export function calculateSendProgress(
  sent: number,
  eligibleCount: number,
  listSize: number,
  elapsedMs: number
): SendProgressSnapshot {
  const target = Math.max(eligibleCount, listSize);
  const avgSeconds = sent > 0 ? elapsedMs / 1000 / sent : 0;
  const remaining = Math.max(target - sent, 0);
  const etaMs = avgSeconds > 0 ? avgSeconds * remaining * 1000 : 0;
  const percentRemaining = target > 0 ? (remaining * 100) / target : 0;

  return { sent, target, elapsedMs, avgSeconds, etaMs, remaining, percentRemaining };
}

/**
 * Status line reported every N sends and at the end of a batch
 */
export function formatSendProgress(label: string, snapshot: SendProgressSnapshot): string {
  return `${label} Sent ${snapshot.sent}/${snapshot.target}` +
    ` | Elapsed ${formatDuration(snapshot.elapsedMs)}` +
    ` | Avg ${snapshot.avgSeconds.toFixed(2)}s/email` +
    ` | ETA ${formatDuration(snapshot.etaMs)}` +
    ` | Remaining ${snapshot.remaining} (${snapshot.percentRemaining.toFixed(1)}% left).`;
}

/**
 * Whether a progress line is due after `sent` sends
 */
export function isProgressDue(sent: number, listSize: number, interval: number): boolean {
  return sent === listSize || (interval > 0 && sent % interval === 0);
}
