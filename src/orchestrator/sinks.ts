import fs from 'fs/promises';
import path from 'path';
import type { EventSink, LoopEvent } from './events';

/** Forwards every event to each sink in turn */
export class CompositeSink implements EventSink {
  private sinks: EventSink[];

  constructor(...sinks: EventSink[]) {
    this.sinks = sinks;
  }

  async emit(event: LoopEvent): Promise<void> {
    for (const sink of this.sinks) {
      await sink.emit(event);
    }
  }
}

/** Keeps the stream as an ordered in-memory log */
export class CollectingSink implements EventSink {
  readonly events: LoopEvent[] = [];

  emit(event: LoopEvent): void {
    this.events.push(event);
  }

  ofType<T extends LoopEvent['type']>(type: T): Extract<LoopEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<LoopEvent, { type: T }> => e.type === type);
  }
}

/** Writes the final code to the save location carried by the `done` event */
export class SolutionFileSink implements EventSink {
  /** Set only once the solution is on disk */
  savedTo?: string;

  async emit(event: LoopEvent): Promise<void> {
    if (event.type !== 'done' || !event.saveLocation) return;

    await fs.mkdir(path.dirname(event.saveLocation), { recursive: true });
    await fs.writeFile(event.saveLocation, `${event.finalCode}\n`, 'utf8');
    this.savedTo = event.saveLocation;
  }
}
