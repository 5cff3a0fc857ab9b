import { DomainError } from '../errors/domain-error.js';
import { parseIdentity, type Identity } from './identity.js';
import { logger } from '../observability/logger.js';
import type { Transactional } from './transaction.js';

/**
 * Native balances of the hosting environment. The queue's custody is simply
 * the balance held under its own identity.
 */
export interface FundsLedger extends Transactional {
  balanceOf(identity: Identity): bigint;
  transfer(from: Identity, to: Identity, amount: bigint): void;
}

/**
 * Invoked after a recipient has been credited. Throwing reverts the transfer,
 * the way a contract's receive function can reject a payment.
 */
export type ReceiveHook = (from: Identity, amount: bigint) => void;

export type BalanceSnapshot = Record<string, string>;

export class InMemoryFundsLedger implements FundsLedger {
  private balances: Map<Identity, bigint> = new Map();
  private receiveHooks: Map<Identity, ReceiveHook> = new Map();

  balanceOf(identity: Identity): bigint {
    return this.balances.get(identity) ?? 0n;
  }

  credit(identity: Identity, amount: bigint): bigint {
    const next = this.balanceOf(identity) + amount;
    this.balances.set(identity, next);
    return next;
  }

  transfer(from: Identity, to: Identity, amount: bigint): void {
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      throw new DomainError('InsufficientFunds', 'Sender balance is too low for transfer', {
        from,
        balance: fromBalance.toString(),
        amount: amount.toString(),
      });
    }

    const rollback = this.checkpoint();
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.receiveHooks.get(to);
    if (!hook) return;

    try {
      hook(from, amount);
    } catch (error) {
      rollback();
      logger.warn('transfer_rejected', 'Recipient rejected transfer', {
        from,
        to,
        amount,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  onReceive(identity: Identity, hook: ReceiveHook): void {
    this.receiveHooks.set(identity, hook);
  }

  clearReceiveHook(identity: Identity): void {
    this.receiveHooks.delete(identity);
  }

  checkpoint(): () => void {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }

  snapshot(): BalanceSnapshot {
    const out: BalanceSnapshot = {};
    for (const [identity, balance] of this.balances.entries()) {
      out[identity] = balance.toString();
    }
    return out;
  }

  restore(snapshot: BalanceSnapshot): void {
    this.balances = new Map();
    for (const [identity, balance] of Object.entries(snapshot)) {
      this.balances.set(parseIdentity(identity), BigInt(balance));
    }
  }
}
