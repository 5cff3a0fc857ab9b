import { describe, expect, it } from 'vitest';
import { parseAmount } from '../src/chain/amount.js';
import { ManualClock } from '../src/chain/clock.js';
import { InMemoryFundsLedger } from '../src/chain/funds.js';
import { ZERO_IDENTITY, parseIdentity, requireIdentity, shortIdentity } from '../src/chain/identity.js';
import { TransactionRunner } from '../src/chain/transaction.js';
import { PendingEventSink } from '../src/events/pending-sink.js';
import { ALICE, BOB, captureError } from './helpers.js';

describe('identity', () => {
  it('normalizes addresses to lower case', () => {
    expect(parseIdentity('0x00000000000000000000000000000000000000AB')).toBe(
      '0x00000000000000000000000000000000000000ab'
    );
  });

  it('rejects malformed addresses', () => {
    for (const value of ['', '0x1234', 'not-an-address', 42, null, '0x' + 'g'.repeat(40)]) {
      expect(captureError(() => parseIdentity(value, 'target'))).toMatchObject({
        code: 'InvalidInput',
        message: 'target must be a 0x-prefixed 20-byte hex address',
      });
    }
  });

  it('rejects the zero address only when required', () => {
    expect(parseIdentity('0x0000000000000000000000000000000000000000')).toBe(ZERO_IDENTITY);
    expect(captureError(() => requireIdentity(ZERO_IDENTITY, 'owner'))).toMatchObject({
      message: 'owner must not be the zero address',
    });
  });

  it('shortens for logging', () => {
    expect(shortIdentity(ALICE)).toBe('0x00000000...');
  });
});

describe('parseAmount', () => {
  it('accepts bigint, safe integers and decimal strings', () => {
    expect(parseAmount(5n)).toBe(5n);
    expect(parseAmount(7)).toBe(7n);
    expect(parseAmount('5000000000000000000')).toBe(5_000_000_000_000_000_000n);
  });

  it('rejects negative, fractional and non-numeric values', () => {
    for (const value of [-1n, -1, 1.5, '1.5', '-3', '', 'abc', undefined]) {
      expect(captureError(() => parseAmount(value, 'fee'))).toMatchObject({ code: 'InvalidInput' });
    }
  });
});

describe('ManualClock', () => {
  it('only moves forward on advance', () => {
    const clock = new ManualClock(100);
    clock.advance(5);
    expect(clock.now()).toBe(105);
    expect(() => clock.advance(-1)).toThrow('ManualClock cannot move backwards');
  });
});

describe('InMemoryFundsLedger', () => {
  it('moves balances between identities', () => {
    const funds = new InMemoryFundsLedger();
    expect(funds.credit(ALICE, 10n)).toBe(10n);

    funds.transfer(ALICE, BOB, 4n);

    expect(funds.balanceOf(ALICE)).toBe(6n);
    expect(funds.balanceOf(BOB)).toBe(4n);
  });

  it('refuses transfers above the sender balance', () => {
    const funds = new InMemoryFundsLedger();
    funds.credit(ALICE, 3n);

    expect(captureError(() => funds.transfer(ALICE, BOB, 4n))).toMatchObject({ code: 'InsufficientFunds' });
    expect(funds.balanceOf(ALICE)).toBe(3n);
  });

  it('reverts a transfer the recipient rejects', () => {
    const funds = new InMemoryFundsLedger();
    funds.credit(ALICE, 10n);
    funds.onReceive(BOB, () => {
      throw new Error('no thanks');
    });

    expect(() => funds.transfer(ALICE, BOB, 4n)).toThrow('no thanks');
    expect(funds.balanceOf(ALICE)).toBe(10n);
    expect(funds.balanceOf(BOB)).toBe(0n);
  });

  it('restores balances from a checkpoint and a snapshot', () => {
    const funds = new InMemoryFundsLedger();
    funds.credit(ALICE, 10n);
    const rollback = funds.checkpoint();
    funds.transfer(ALICE, BOB, 10n);
    rollback();
    expect(funds.snapshot()).toEqual({ [ALICE]: '10' });

    const restored = new InMemoryFundsLedger();
    restored.restore({ [ALICE]: '10', [BOB]: '2' });
    expect(restored.balanceOf(BOB)).toBe(2n);
  });
});

describe('TransactionRunner', () => {
  function setup() {
    const sink = new PendingEventSink();
    let value = 0;
    const runner = new TransactionRunner({
      component: 'Counter',
      clock: new ManualClock(500),
      sink,
      participants: [
        {
          checkpoint: () => {
            const saved = value;
            return () => {
              value = saved;
            };
          },
        },
      ],
    });
    return { sink, runner, read: () => value, write: (next: number) => (value = next) };
  }

  it('publishes buffered events on commit', () => {
    const { sink, runner, write } = setup();

    runner.run('bump', (tx) => {
      write(1);
      tx.emit({ type: 'WorkStarted', requestId: 1 });
      tx.emit({ type: 'WorkCompleted', requestId: 1, reportId: 2 });
    });

    expect(sink.drain()).toEqual([
      {
        emittedAt: 500,
        events: [
          { type: 'WorkStarted', requestId: 1 },
          { type: 'WorkCompleted', requestId: 1, reportId: 2 },
        ],
      },
    ]);
  });

  it('restores participants and drops events on failure', () => {
    const { sink, runner, read, write } = setup();

    expect(() =>
      runner.run('bump', (tx) => {
        write(3);
        tx.emit({ type: 'WorkStarted', requestId: 1 });
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(read()).toBe(0);
    expect(sink.size()).toBe(0);
    expect(runner.isBusy()).toBe(false);
  });

  it('rolls back when the commit hook throws', () => {
    const { runner, read, write } = setup();

    expect(() =>
      runner.run(
        'bump',
        () => write(9),
        () => {
          throw new Error('invariant');
        }
      )
    ).toThrow('invariant');
    expect(read()).toBe(0);
  });

  it('rejects nested calls into the same component', () => {
    const { runner } = setup();

    const error = captureError(() => runner.run('outer', () => runner.run('inner', () => 1)));

    expect(error).toMatchObject({
      code: 'ReentrantCall',
      message: 'Counter.inner called while outer is in flight',
    });
    expect(runner.isBusy()).toBe(false);
  });
});
