import type { EngineError, EventSink, OpResult } from '../../types';
import type { Roster } from './roster';

export interface CurrencyOptions {
  /** 0 = 关闭检查点奖励 */
  checkpoint_interval: number;
  checkpoint_bonus: number;
}

export function insufficient(player_id: number, amount: number, balance: number): EngineError {
  return {
    code: 'INSUFFICIENT_FUNDS',
    message: `player ${player_id} cannot afford ${amount} (balance ${balance})`,
    details: { player_id, amount, balance },
  };
}

function assert_amount(amount: number): void {
  if (!Number.isInteger(amount) || amount < 0) {
    throw new RangeError(`amount must be a non-negative integer, got ${amount}`);
  }
}

/**
 * 货币账本。余额存放在 roster 的 PlayerState 上，账本只负责读写规则：
 * - credit 总是成功；带 key 时同一 key 只入账一次，可安全重试
 * - debit 余额不足时失败且不改动
 * - transfer = debit + credit，debit 失败则什么都不发生
 * 破产是 balance ≤ 0 的派生判断，不单独存储。
 */
export class CurrencyLedger {
  private readonly applied_keys = new Set<string>();

  constructor(
    private readonly roster: Roster,
    private readonly emit: EventSink,
    private readonly options: CurrencyOptions,
  ) {}

  balance(player_id: number): number {
    return this.roster.get(player_id).balance;
  }

  /** 入账；返回入账后的余额 */
  credit(player_id: number, amount: number, key?: string): number {
    assert_amount(amount);
    const player = this.roster.get(player_id);
    if (key !== undefined) {
      if (this.applied_keys.has(key)) return player.balance;
      this.applied_keys.add(key);
    }
    player.balance += amount;
    return player.balance;
  }

  debit(player_id: number, amount: number): OpResult {
    assert_amount(amount);
    const player = this.roster.get(player_id);
    if (player.balance < amount) {
      return { ok: false, error: insufficient(player_id, amount, player.balance) };
    }
    player.balance -= amount;
    return { ok: true };
  }

  /** 原子转账：先检查再同时改两边 */
  transfer(from_id: number, to_id: number, amount: number): OpResult {
    assert_amount(amount);
    // 先取到收款方，保证 debit 之后的 credit 不会因为 id 非法而抛错
    this.roster.get(to_id);
    if (from_id === to_id) return { ok: true };
    const debited = this.debit(from_id, amount);
    if (!debited.ok) return debited;
    this.credit(to_id, amount);
    return { ok: true };
  }

  can_afford(player_id: number, amount: number): boolean {
    return this.balance(player_id) >= amount;
  }

  is_bankrupt(player_id: number): boolean {
    return this.balance(player_id) <= 0;
  }

  /** 停在检查点（interval 的非零倍数）时发放奖励 */
  resolve_checkpoint(player_id: number, position: number): void {
    const { checkpoint_interval, checkpoint_bonus } = this.options;
    if (checkpoint_interval <= 0 || checkpoint_bonus <= 0) return;
    if (position <= 0 || position % checkpoint_interval !== 0) return;
    const balance = this.credit(player_id, checkpoint_bonus);
    this.emit({ type: 'checkpoint_bonus_credited', player_id, position, amount: checkpoint_bonus, balance });
  }
}
