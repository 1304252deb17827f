import { InMemoryQuotaCounter } from './in-memory-quota.counter';

describe('InMemoryQuotaCounter', () => {
  it('should grant until the limit and refuse afterwards', async () => {
    const now = new Date('2026-10-19T10:00:00Z');
    const counter = new InMemoryQuotaCounter(2, 0, () => now);

    expect((await counter.tryConsume()).granted).toBe(true);
    expect(await counter.tryConsume()).toEqual({
      granted: true,
      used: 2,
      limit: 2,
      resetsAt: new Date('2026-10-20T00:00:00Z'),
    });
    expect(await counter.tryConsume()).toEqual({
      granted: false,
      used: 2,
      limit: 2,
      resetsAt: new Date('2026-10-20T00:00:00Z'),
    });
  });

  it('should start over when the window rolls', async () => {
    let now = new Date('2026-10-19T23:59:00Z');
    const counter = new InMemoryQuotaCounter(1, 0, () => now);

    expect((await counter.tryConsume()).granted).toBe(true);
    expect((await counter.tryConsume()).granted).toBe(false);

    now = new Date('2026-10-20T00:00:00Z');
    expect((await counter.peek()).used).toBe(0);
    expect((await counter.tryConsume()).granted).toBe(true);
  });

  it('should refuse everything with a zero quota', async () => {
    const counter = new InMemoryQuotaCounter(0);
    expect((await counter.tryConsume()).granted).toBe(false);
  });
});
