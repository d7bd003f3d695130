import type { EngineError, EventSink } from '../../types';
import type { BoardModel } from './board';
import type { CurrencyLedger } from './currency';
import type { Roster } from './roster';

export interface MoveResult {
  from: number;
  to: number;
  /** 本次移动是否越过起点（每次调用最多一次） */
  passed_start: boolean;
}

/**
 * 移动模块。
 * - 方格棋盘：走到 size - 1 为止，不回绕
 * - 环形棋盘：(current + spaces) mod size；current + spaces ≥ size 即视为经过起点，
 *   一次 move 不论绕了几圈都只触发一次 passed_start
 * - teleport 不做回绕判断，也不触发 passed_start
 * 若挂了账本且 pass_bonus > 0，经过起点后立刻发放奖励。
 */
export class MovementModel {
  constructor(
    private readonly board: BoardModel,
    private readonly roster: Roster,
    private readonly emit: EventSink,
    private readonly ledger: CurrencyLedger | null,
    private readonly pass_bonus: number,
  ) {}

  move(player_id: number, spaces: number): MoveResult {
    if (!Number.isInteger(spaces) || spaces < 0) {
      throw new RangeError(`spaces must be a non-negative integer, got ${spaces}`);
    }
    const player = this.roster.get(player_id);
    const size = this.board.size;
    const from = player.position;

    let to: number;
    let passed_start = false;
    if (this.board.is_grid) {
      to = Math.min(from + spaces, size - 1);
    } else {
      to = (from + spaces) % size;
      passed_start = from + spaces >= size;
    }

    player.position = to;
    this.emit({ type: 'player_moved', player_id, from, to, spaces });

    if (passed_start) {
      this.emit({ type: 'passed_start', player_id });
      if (this.ledger && this.pass_bonus > 0) {
        const balance = this.ledger.credit(player_id, this.pass_bonus);
        this.emit({ type: 'pass_bonus_credited', player_id, amount: this.pass_bonus, balance });
      }
    }

    return { from, to, passed_start };
  }

  teleport(player_id: number, target: number): { ok: true; result: MoveResult } | { ok: false; error: EngineError } {
    if (!this.board.is_valid_position(target)) {
      return {
        ok: false,
        error: { code: 'INVALID_TARGET', message: `position ${target} is off the board`, details: { target } },
      };
    }
    const player = this.roster.get(player_id);
    const from = player.position;
    player.position = target;
    this.emit({ type: 'player_teleported', player_id, from, to: target });
    return { ok: true, result: { from, to: target, passed_start: false } };
  }

  distance(a: number, b: number): number {
    return this.board.distance(a, b);
  }
}
