// Unit tests for the retry of failing calls

import { expect } from 'chai';
import { CommandFailed, ValueError } from '../src/exceptions';
import { retry, retryDelays, withRetry } from '../src/retry';

// Function failing the given number of times before it returns 'done'.
function flaky (failures: number, err: () => Error) {
  const state = { calls: 0 };
  const fn = async () => {
    state.calls++;
    if (state.calls <= failures) {
      throw err();
    }
    return 'done';
  };
  return { state, fn };
}

module.exports = function () {
  it('should compute the delays with backoff', () => {
    expect(retryDelays(4, 1, 2)).to.deep.equal([1000, 2000, 4000]);
    expect(retryDelays(3, 0.5, 1)).to.deep.equal([500, 500]);
    expect(retryDelays(1, 1, 2)).to.deep.equal([]);
  });

  it('should retry until the call succeeds', async () => {
    const { state, fn } = flaky(2, () => new CommandFailed('oops'));
    const res = await withRetry(CommandFailed, { tries: 3, delay: 0.001, backoff: 1 }, fn);
    expect(res).to.equal('done');
    expect(state.calls).to.equal(3);
  });

  it('should give up after the tries', async () => {
    const { state, fn } = flaky(5, () => new CommandFailed('oops'));
    try {
      await withRetry(CommandFailed, { tries: 2, delay: 0.001 }, fn);
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(state.calls).to.equal(2);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should not retry other errors', async () => {
    const { state, fn } = flaky(1, () => new ValueError('bad value'));
    try {
      await withRetry([CommandFailed], { tries: 3, delay: 0.001 }, fn);
    } catch (err) {
      expect(err).to.be.instanceOf(ValueError);
      expect(state.calls).to.equal(1);
      return;
    }
    throw new Error('Expected an exception');
  });

  it('should retry only errors with the text', async () => {
    const { state, fn } = flaky(1, () => new CommandFailed('connection refused'));
    try {
      await withRetry(CommandFailed, { tries: 3, delay: 0.001, textInException: 'not found' }, fn);
    } catch (err) {
      expect(err).to.be.instanceOf(CommandFailed);
      expect(state.calls).to.equal(1);
    }
    const other = flaky(1, () => new CommandFailed('pod not found'));
    await withRetry(CommandFailed, { tries: 3, delay: 0.001, textInException: 'not found' }, other.fn);
    expect(other.state.calls).to.equal(2);
  });

  it('should wrap a function by retry()', async () => {
    let calls = 0;
    const double = retry(CommandFailed, { tries: 2, delay: 0.001 })(async (n: number) => {
      calls++;
      if (calls === 1) {
        throw new CommandFailed('first call fails');
      }
      return n * 2;
    });
    expect(await double(21)).to.equal(42);
    expect(calls).to.equal(2);
  });
};
