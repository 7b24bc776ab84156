import { ClientLock } from '../src/services/client-lock';

const tick = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

describe('ClientLock', () => {
  it('runs tasks for the same client one at a time', async () => {
    const lock = new ClientLock();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.run('client-1', task('a')),
      lock.run('client-1', task('b'))
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(lock.isHeld('client-1')).toBe(false);
  });

  it('lets different clients interleave', async () => {
    const lock = new ClientLock();
    const events: string[] = [];

    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    };

    await Promise.all([lock.run('client-1', task('a')), lock.run('client-2', task('b'))]);

    expect(events.indexOf('b:start')).toBeLessThan(events.indexOf('a:end'));
  });

  it('releases the lock when a task fails', async () => {
    const lock = new ClientLock();

    await expect(lock.run('client-1', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.run('client-1', async () => 'next')).resolves.toBe('next');
    expect(lock.isHeld('client-1')).toBe(false);
  });
});
