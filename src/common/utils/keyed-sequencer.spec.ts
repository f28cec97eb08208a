import { KeyedSequencer } from './keyed-sequencer';

describe('KeyedSequencer', () => {
  const deferred = () => {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
      resolve = r;
    });
    return { promise, resolve };
  };

  it('should run tasks under one key in submission order', async () => {
    const sequencer = new KeyedSequencer();
    const order: string[] = [];
    const gate = deferred();

    const first = sequencer.run('job-1', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = sequencer.run('job-1', async () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('should not hold one key behind another', async () => {
    const sequencer = new KeyedSequencer();
    const gate = deferred();

    const blocked = sequencer.run('job-1', () => gate.promise);
    const other = await sequencer.run('job-2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('should keep going after a task rejects', async () => {
    const sequencer = new KeyedSequencer();

    const failing = sequencer.run('jobs', async () => {
      throw new Error('disk full');
    });
    const next = sequencer.run('jobs', async () => 42);

    await expect(failing).rejects.toThrow('disk full');
    await expect(next).resolves.toBe(42);
  });

  it('should forget keys once their work drains', async () => {
    const sequencer = new KeyedSequencer();

    await sequencer.run('job-1', async () => undefined);
    await new Promise((resolve) => setImmediate(resolve));

    expect(sequencer.activeKeys).toBe(0);
  });
});
