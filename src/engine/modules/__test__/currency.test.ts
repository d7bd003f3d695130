import { describe, it, expect } from 'vitest';
import type { MatchEventBody } from '../../../types';
import { CurrencyLedger } from '../currency';
import { Roster } from '../roster';

function setup(balances: number[], checkpoint = { checkpoint_interval: 0, checkpoint_bonus: 0 }) {
  const roster = Roster.seed(balances.length, 0, 100);
  balances.forEach((b, i) => {
    roster.get(i).balance = b;
  });
  const events: MatchEventBody[] = [];
  const ledger = new CurrencyLedger(roster, (e) => events.push(e), checkpoint);
  return { roster, ledger, events };
}

describe('CurrencyLedger', () => {
  it('should credit and return the new balance', () => {
    const { ledger } = setup([100]);
    expect(ledger.credit(0, 50)).toBe(150);
    expect(ledger.balance(0)).toBe(150);
  });

  it('should apply a keyed credit only once', () => {
    const { ledger } = setup([100]);
    ledger.credit(0, 50, 'bonus-1');
    ledger.credit(0, 50, 'bonus-1');
    ledger.credit(0, 50, 'bonus-2');
    expect(ledger.balance(0)).toBe(200);
  });

  it('should debit only when the balance covers the amount', () => {
    const { ledger } = setup([100]);
    expect(ledger.debit(0, 100)).toEqual({ ok: true });
    expect(ledger.balance(0)).toBe(0);
    const r = ledger.debit(0, 1);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.code).toBe('INSUFFICIENT_FUNDS');
    expect(ledger.balance(0)).toBe(0);
  });

  it('should keep the combined balance of both parties on transfer', () => {
    const { ledger } = setup([300, 40]);
    expect(ledger.transfer(0, 1, 120)).toEqual({ ok: true });
    expect([ledger.balance(0), ledger.balance(1)]).toEqual([180, 160]);
    expect(ledger.balance(0) + ledger.balance(1)).toBe(340);
  });

  it('should leave both balances unchanged when a transfer fails', () => {
    const { ledger } = setup([30, 500]);
    const r = ledger.transfer(0, 1, 50);
    expect(r.ok).toBe(false);
    expect([ledger.balance(0), ledger.balance(1)]).toEqual([30, 500]);
  });

  it('should treat a self transfer as a no-op', () => {
    const { ledger } = setup([30]);
    expect(ledger.transfer(0, 0, 500)).toEqual({ ok: true });
    expect(ledger.balance(0)).toBe(30);
  });

  it('should throw before debiting when the recipient does not exist', () => {
    const { ledger } = setup([300]);
    expect(() => ledger.transfer(0, 7, 10)).toThrow('unknown player id: 7');
    expect(ledger.balance(0)).toBe(300);
  });

  it('should reject negative or fractional amounts', () => {
    const { ledger } = setup([300]);
    expect(() => ledger.credit(0, -1)).toThrow(RangeError);
    expect(() => ledger.debit(0, 1.5)).toThrow(RangeError);
  });

  it('should derive bankruptcy from the balance', () => {
    const { ledger } = setup([0, 1]);
    expect(ledger.is_bankrupt(0)).toBe(true);
    expect(ledger.is_bankrupt(1)).toBe(false);
    ledger.debit(1, 1);
    expect(ledger.is_bankrupt(1)).toBe(true);
  });

  it('should pay the checkpoint bonus on non-zero multiples of the interval', () => {
    const { ledger, events } = setup([100], { checkpoint_interval: 10, checkpoint_bonus: 200 });
    ledger.resolve_checkpoint(0, 0);
    ledger.resolve_checkpoint(0, 15);
    ledger.resolve_checkpoint(0, 20);
    expect(events).toEqual([{ type: 'checkpoint_bonus_credited', player_id: 0, position: 20, amount: 200, balance: 300 }]);
  });
});
