// Unit tests for the serial work queue

import { expect } from 'chai';
import { Workq } from '../src/workq';
import { sleep } from '../src/utils';

module.exports = function () {
  it('should run the tasks one after another in the order', async () => {
    const wq = new Workq('test');
    const events: string[] = [];
    const task = async (name: string) => {
      events.push(`start ${name}`);
      await sleep(0.01);
      events.push(`end ${name}`);
      return name.toUpperCase();
    };
    const results = await Promise.all([wq.push('a', task), wq.push('b', task), wq.push('c', task)]);
    expect(results).to.deep.equal(['A', 'B', 'C']);
    expect(events).to.deep.equal(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
    expect(wq.busy).to.be.false;
  });

  it('should count the pending tasks', async () => {
    const wq = new Workq();
    const first = wq.push(null, () => sleep(0.01));
    const second = wq.push(null, () => sleep(0.01));
    expect(wq.busy).to.be.true;
    expect(wq.pending).to.equal(1);
    await Promise.all([first, second]);
    expect(wq.pending).to.equal(0);
  });

  it('should continue with the next task after a failure', async () => {
    const wq = new Workq();
    const failing = wq.push(null, async () => {
      throw new Error('task failed');
    });
    const next = wq.push(7, async (n: number) => n + 1);
    let error: unknown;
    try {
      await failing;
    } catch (err) {
      error = err;
    }
    expect(error).to.be.instanceOf(Error);
    expect(await next).to.equal(8);
  });
};
