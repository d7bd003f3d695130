import type { DamageRangeType } from '../../schema';
import type { CombatRecord, DamageSource, EventSink, OpResult } from '../../types';
import { next_int } from '../../utils/rng.util';
import type { Rng } from '../../utils/rng.util';
import type { Roster } from './roster';

export interface CombatOptions {
  max_health: number;
  combat_interval: number;
  /** true = 各自一张棋盘，落点战斗为 PvE */
  separate_boards: boolean;
  environment_damage: DamageRangeType;
  landing_damage: DamageRangeType;
  attack_damage: DamageRangeType;
}

/** 出局时释放该玩家的全部持有物（由 composer 接到地产模块上） */
export type ReleaseHoldings = (player_id: number) => void;

/**
 * 战斗模块。血量存放在 PlayerState.health 上，alive 永远由 health > 0 推导。
 * 血量降到 0：标记出局，并在同一步释放其地产。
 */
export class CombatModel {
  constructor(
    private readonly roster: Roster,
    private readonly rng: Rng,
    private readonly emit: EventSink,
    private readonly release_holdings: ReleaseHoldings | null,
    private readonly options: CombatOptions,
  ) {}

  record(player_id: number): CombatRecord {
    const p = this.roster.get(player_id);
    return { player_id, health: p.health, max_health: this.options.max_health, alive: p.health > 0 };
  }

  records(): CombatRecord[] {
    return this.roster.players.map((p) => this.record(p.id));
  }

  is_combat_space(position: number): boolean {
    return position > 0 && position % this.options.combat_interval === 0;
  }

  /**
   * 停在战斗格（combat_interval 的非零倍数）时触发：
   * - 分开的棋盘：环境伤害打在落点玩家身上
   * - 共享棋盘：与位置差最小的其他存活玩家交战（平局取 id 较小者），伤害打在对方身上
   */
  resolve_landing(player_id: number, position: number): void {
    if (!this.is_combat_space(position)) return;
    if (!this.roster.is_active(player_id)) return;

    if (this.options.separate_boards) {
      this.apply_damage(player_id, null, 'environment', this.roll(this.options.environment_damage));
      return;
    }

    const target = this.nearest_opponent(player_id, position);
    if (target === null) return;
    this.apply_damage(target, player_id, 'landing', this.roll(this.options.landing_damage));
  }

  attack(attacker_id: number, target_id: number): OpResult {
    if (attacker_id === target_id || !this.roster.is_active(target_id)) {
      return {
        ok: false,
        error: {
          code: 'INVALID_TARGET',
          message: `player ${attacker_id} cannot attack player ${target_id}`,
          details: { attacker_id, target_id },
        },
      };
    }
    this.apply_damage(target_id, attacker_id, 'attack', this.roll(this.options.attack_damage));
    return { ok: true };
  }

  /** 回血，封顶 max_health；已出局的玩家不回血 */
  heal(player_id: number, amount: number): number {
    if (!Number.isInteger(amount) || amount < 0) {
      throw new RangeError(`heal amount must be a non-negative integer, got ${amount}`);
    }
    const p = this.roster.get(player_id);
    if (p.health <= 0 || amount === 0) return p.health;
    const before = p.health;
    p.health = Math.min(this.options.max_health, p.health + amount);
    this.emit({ type: 'player_healed', player_id, amount: p.health - before, health: p.health });
    return p.health;
  }

  /** 恰好剩一个存活玩家且就是 player_id */
  has_player_won(player_id: number): boolean {
    const active = this.roster.active_players();
    return active.length === 1 && active[0]?.id === player_id;
  }

  private nearest_opponent(player_id: number, position: number): number | null {
    let best: number | null = null;
    let best_distance = Infinity;
    for (const p of this.roster.active_players()) {
      if (p.id === player_id) continue;
      const d = Math.abs(p.position - position);
      if (d < best_distance) {
        best = p.id;
        best_distance = d;
      }
    }
    return best;
  }

  private roll(range: DamageRangeType): number {
    return next_int(this.rng, range.min, range.max);
  }

  private apply_damage(target_id: number, attacker_id: number | null, source: DamageSource, damage: number): void {
    const p = this.roster.get(target_id);
    p.health = Math.max(0, p.health - damage);
    this.emit({ type: 'combat_damage', source, attacker_id, target_id, damage, health: p.health });
    if (p.health > 0 || !p.active) return;

    this.roster.deactivate(target_id);
    if (this.release_holdings) this.release_holdings(target_id);
    this.emit({ type: 'player_eliminated', player_id: target_id, cause: 'combat', by: attacker_id });
  }
}
