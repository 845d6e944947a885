// Unit tests for the worker pool and the stop event

import { expect } from 'chai';
import { sleep } from '../src/utils';
import { StopEvent, WorkerPool } from '../src/worker_pool';

module.exports = function () {
  describe('worker pool', () => {
    it('should not run more tasks than the max workers', async () => {
      const pool = new WorkerPool(2);
      let running = 0;
      let maxSeen = 0;
      const results = await pool.map([1, 2, 3, 4, 5], async (n) => {
        running++;
        maxSeen = Math.max(maxSeen, running);
        await sleep(0.01);
        running--;
        return n * 10;
      });
      expect(results).to.deep.equal([10, 20, 30, 40, 50]);
      expect(maxSeen).to.equal(2);
      expect(pool.active).to.equal(0);
    });

    it('should report the queued tasks', async () => {
      const pool = new WorkerPool(1);
      const first = pool.submit(() => sleep(0.01));
      const second = pool.submit(() => sleep(0.01));
      expect(pool.active).to.equal(1);
      expect(pool.queued).to.equal(1);
      await Promise.all([first, second]);
    });

    it('should let all tasks settle before map throws', async () => {
      const pool = new WorkerPool(3);
      const finished: number[] = [];
      try {
        await pool.map([1, 2, 3], async (n) => {
          if (n === 1) {
            throw new Error('first fails');
          }
          await sleep(0.01);
          finished.push(n);
        });
      } catch (err) {
        expect(err).to.have.property('message', 'first fails');
        expect(finished).to.have.members([2, 3]);
        return;
      }
      throw new Error('Expected an exception');
    });

    it('should wait for all the tasks on shutdown', async () => {
      const pool = new WorkerPool(2);
      let done = 0;
      for (let i = 0; i < 4; i++) {
        void pool.submit(async () => {
          await sleep(0.01);
          done++;
        });
      }
      await pool.shutdown();
      expect(done).to.equal(4);
    });
  });

  describe('stop event', () => {
    it('should time out when not set', async () => {
      const ev = new StopEvent();
      expect(await ev.wait(0.01)).to.be.false;
      expect(ev.isSet()).to.be.false;
    });

    it('should wake up the waiter when set', async () => {
      const ev = new StopEvent();
      const start = Date.now();
      setTimeout(() => ev.set(), 10);
      expect(await ev.wait(10)).to.be.true;
      expect(Date.now() - start).to.be.below(5000);
    });

    it('should return immediately once set and reset on clear', async () => {
      const ev = new StopEvent();
      ev.set();
      expect(await ev.wait(10)).to.be.true;
      ev.clear();
      expect(ev.isSet()).to.be.false;
      expect(await ev.wait(0.01)).to.be.false;
    });
  });
};
