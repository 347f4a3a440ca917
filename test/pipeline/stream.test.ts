import { describe, it, expect } from 'vitest';
import { streamBatch, type BatchProgressEvent } from '../../src/pipeline/stream.js';
import { MemoryStore } from '../../src/db/memory-store.js';
import { tableProbe } from '../helpers/fakes.js';

async function collect(gen: AsyncGenerator<BatchProgressEvent>): Promise<BatchProgressEvent[]> {
  const events: BatchProgressEvent[] = [];
  for await (const event of gen) events.push(event);
  return events;
}

describe('streamBatch', () => {
  const probe = tableProbe({
    'https://slow.test': { available: true, statusCode: 200, statusLabel: 'available', responseTimeMs: 400 },
    'https://fast.test': { available: true, statusCode: 200, statusLabel: 'available', responseTimeMs: 40 },
  });

  it('should emit progress in input order and finish with the ranked batch', async () => {
    const events = await collect(
      streamBatch(['https://slow.test', 'https://down.test', 'https://fast.test'], { probe }),
    );

    expect(events).toHaveLength(4);
    expect(
      events.flatMap((e) => (e.type === 'progress' ? [[e.completed, e.total, e.result.endpoint]] : [])),
    ).toEqual([
      [1, 3, 'https://slow.test'],
      [2, 3, 'https://down.test'],
      [3, 3, 'https://fast.test'],
    ]);

    const last = events[3];
    expect(last?.type).toBe('done');
    if (last?.type !== 'done') return;
    expect(last.batch.results.map((r) => r.endpoint)).toEqual([
      'https://fast.test',
      'https://slow.test',
      'https://down.test',
    ]);
    expect(last.batch).toMatchObject({ total: 3, available: 2, unavailable: 1 });
  });

  it('should emit only the final event for an empty list', async () => {
    const events = await collect(streamBatch([], { probe }));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'done', batch: { total: 0, results: [] } });
  });

  it('should persist each result as it arrives', async () => {
    const store = new MemoryStore();
    const gen = streamBatch(['https://slow.test', 'https://fast.test'], { probe, persistTo: store });

    const first = await gen.next();
    expect(first.value).toMatchObject({ type: 'progress', completed: 1 });
    expect((await store.getStats()).map((s) => s.endpoint)).toEqual(['https://slow.test']);

    await collect(gen);
    expect(await store.getStats()).toHaveLength(2);
  });
});
