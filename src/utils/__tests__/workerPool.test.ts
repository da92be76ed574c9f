import { WorkerPool } from '../workerPool';
import { FatalConfigurationError } from '../errors';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 1));

describe('WorkerPool', () => {
  it('never runs more tasks at once than its width', async () => {
    const pool = new WorkerPool(3);
    let active = 0;
    let peak = 0;

    await pool.map(Array.from({ length: 10 }, (_, i) => i), async () => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
    });

    expect(peak).toBe(3);
  });

  it('returns results in input order', async () => {
    const pool = new WorkerPool(4);
    const delays = [5, 1, 3, 0];

    const results = await pool.map(delays, async (ms, index) => {
      await new Promise(resolve => setTimeout(resolve, ms));
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:5', '1:1', '2:3', '3:0']);
  });

  it.each([0, -1, 1.5])('rejects width %s', width => {
    expect(() => new WorkerPool(width)).toThrow(FatalConfigurationError);
  });
});
