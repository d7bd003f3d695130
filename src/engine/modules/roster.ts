import type { PlayerState } from '../../types';

/**
 * 玩家竞技场：所有 PlayerState 的唯一所有者。
 * 各模块只按 id 取用，不保存玩家对象的副本。
 */
export class Roster {
  readonly players: PlayerState[];

  constructor(players: PlayerState[]) {
    this.players = players;
  }

  /** 按 starting_balance / starting_health 生成 count 名玩家，全部站在 0 号格 */
  static seed(count: number, starting_balance: number, starting_health: number): Roster {
    const players: PlayerState[] = [];
    for (let id = 0; id < count; id++) {
      players.push({
        id,
        position: 0,
        balance: starting_balance,
        active: true,
        owned_positions: [],
        health: starting_health,
      });
    }
    return new Roster(players);
  }

  get size(): number {
    return this.players.length;
  }

  has(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.players.length;
  }

  /** 取玩家；id 越界属于程序错误 */
  get(id: number): PlayerState {
    const p = this.players[id];
    if (!p) throw new Error(`unknown player id: ${id}`);
    return p;
  }

  is_active(id: number): boolean {
    return this.has(id) && this.get(id).active;
  }

  active_players(): PlayerState[] {
    return this.players.filter((p) => p.active);
  }

  /** 标记为出局；释放地产由调用方在同一步完成 */
  deactivate(id: number): void {
    this.get(id).active = false;
  }

  /** 从 from 之后按 id 循环找下一个存活玩家；没有则返回 null */
  next_active_after(from: number): number | null {
    const n = this.players.length;
    for (let step = 1; step <= n; step++) {
      const id = (from + step) % n;
      if (this.players[id]?.active) return id;
    }
    return null;
  }
}
