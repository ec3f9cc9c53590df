import { expect } from 'chai';
import { countStatuses } from '../../src/store/archive-store.js';
import { errorMessage, KeyedLock, runPool, toInstant } from '../../src/utils.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('utils', () => {
  it('should turn millisecond timestamps into instants', () => {
    expect(toInstant(1577836800000).toISOString()).to.equal('2020-01-01T00:00:00.000Z');
  });

  it('should read messages from errors and anything else', () => {
    expect(errorMessage(new Error('nope'))).to.equal('nope');
    expect(errorMessage('plain')).to.equal('plain');
  });

  it('should count write statuses', () => {
    expect(countStatuses(['inserted', 'present', 'inserted'])).to.deep.equal({ inserted: 2, present: 1 });
    expect(countStatuses([])).to.deep.equal({ inserted: 0, present: 0 });
  });
});

describe('runPool', () => {
  it('should keep input order and cap the number of workers in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await runPool([5, 1, 4, 2, 3], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      for (let i = 0; i < n; i++) await tick();
      inFlight--;
      return n * 10;
    });

    expect(results).to.deep.equal([50, 10, 40, 20, 30]);
    expect(peak).to.equal(2);
  });

  it('should return an empty list for no items', async () => {
    expect(await runPool([], 4, async () => 1)).to.deep.equal([]);
  });
});

describe('KeyedLock', () => {
  it('should run sections for one key one after another', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    const section = (name: string) => async () => {
      log.push(`${name}:start`);
      await tick();
      log.push(`${name}:end`);
    };

    await Promise.all([lock.run('a', section('first')), lock.run('a', section('second'))]);

    expect(log).to.deep.equal(['first:start', 'first:end', 'second:start', 'second:end']);
    expect(lock.size).to.equal(0);
  });

  it('should let different keys overlap', async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    const section = (name: string) => async () => {
      log.push(`${name}:start`);
      await tick();
      log.push(`${name}:end`);
    };

    await Promise.all([lock.run('a', section('a')), lock.run('b', section('b'))]);

    expect(log.slice(0, 2)).to.deep.equal(['a:start', 'b:start']);
  });

  it('should release the key when a section throws', async () => {
    const lock = new KeyedLock();
    let caught: unknown = null;
    try {
      await lock.run('a', async () => {
        throw new Error('section failed');
      });
    } catch (e) {
      caught = e;
    }

    expect(caught).to.have.property('message', 'section failed');
    expect(await lock.run('a', async () => 'next')).to.equal('next');
    expect(lock.size).to.equal(0);
  });
});
