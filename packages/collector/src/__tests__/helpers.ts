import { EventEmitter } from 'node:events';
import type { MetricsWriter, Sample } from '@validator-watch/shared';

export class CaptureSink implements MetricsWriter {
  samples: Sample[] = [];

  write(samples: Sample[]): void {
    this.samples.push(...samples);
  }

  value(name: string, labels?: Record<string, string>): number | undefined {
    const matches = this.samples.filter(
      (s) =>
        s.name === name &&
        (!labels || Object.entries(labels).every(([key, value]) => s.labels?.[key] === value))
    );
    return matches[matches.length - 1]?.value;
  }

  names(): string[] {
    return this.samples.map((s) => s.name);
  }
}

/** In-process stand-in for a `ws` socket */
export class FakeSocket extends EventEmitter {
  sent: Record<string, unknown>[] = [];
  terminated = false;

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  terminate(): void {
    if (this.terminated) return;
    this.terminated = true;
    this.emit('close', 1006);
  }

  deliver(message: unknown): void {
    this.emit('message', Buffer.from(JSON.stringify(message)));
  }

  lastId(): number {
    const id = this.sent[this.sent.length - 1]?.id;
    return typeof id === 'number' ? id : -1;
  }
}

export async function* feed(items: unknown[]): AsyncGenerator<unknown> {
  for (const item of items) yield item;
}
