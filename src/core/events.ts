import { EventEmitter } from 'events';
import { PatchEvent, PatchEventKind, StampedEvent, Timeline } from './types';

type EventOf<K extends PatchEventKind> = Extract<PatchEvent, { type: K }>;

export class EventBus extends EventEmitter {
  private cursor = 0;
  private timeline: Timeline[] = [];

  emitEvent(event: PatchEvent): number {
    const cursor = this.cursor++;
    const fullEvent: StampedEvent = { ...event, cursor, timestamp: Date.now() };
    this.timeline.push({ cursor, event: fullEvent });

    this.emit(event.type, fullEvent);
    this.emit('*', fullEvent);

    return cursor;
  }

  onEvent<K extends PatchEventKind>(kind: K, listener: (event: StampedEvent<EventOf<K>>) => void): this {
    return this.on(kind, listener);
  }

  onAny(listener: (event: StampedEvent) => void): this {
    return this.on('*', listener);
  }

  getTimeline(since?: number): Timeline[] {
    return since !== undefined ? this.timeline.filter((t) => t.cursor >= since) : [...this.timeline];
  }

  getCursor(): number {
    return this.cursor;
  }

  reset() {
    this.cursor = 0;
    this.timeline = [];
    this.removeAllListeners();
  }
}
