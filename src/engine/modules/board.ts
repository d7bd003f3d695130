import type { RulesType } from '../../schema';
import type { BoardTopology } from '../../types';

/** 环形地产棋盘的标准格数 */
export const STANDARD_LOOP_SIZE = 40;

export type SpaceKind = 'start' | 'goal' | 'special' | 'normal';

export interface GridCoord {
  x: number;
  y: number;
}

/**
 * 棋盘尺寸的唯一计算点。
 * - separate_boards → 方格棋盘，size = tiles_per_side²
 * - 共享环形棋盘：货币 + 可购买地产时固定为 40 格，否则为 tiles_per_side
 * 其他模块一律通过 BoardModel 查询尺寸，不得自行重算。
 */
export function board_topology(rules: RulesType): BoardTopology {
  const n = rules.tiles_per_side;
  if (rules.separate_boards) {
    return { shape: 'square_grid', size: n * n, tiles_per_side: n };
  }
  const trading_loop = rules.currency_enabled && rules.property_purchasable;
  return { shape: 'linear_loop', size: trading_loop ? STANDARD_LOOP_SIZE : n, tiles_per_side: n };
}

export class BoardModel {
  readonly topology: BoardTopology;
  private readonly can_see_enemy_tokens: boolean;
  private readonly visibility_range: number;

  constructor(rules: RulesType) {
    this.topology = board_topology(rules);
    this.can_see_enemy_tokens = rules.can_see_enemy_tokens;
    this.visibility_range = rules.enemy_visibility_range;
  }

  get size(): number {
    return this.topology.size;
  }

  get is_grid(): boolean {
    return this.topology.shape === 'square_grid';
  }

  /** 终点：最后一个线性位置 */
  goal_position(): number {
    return this.size - 1;
  }

  is_valid_position(position: number): boolean {
    return Number.isInteger(position) && position >= 0 && position < this.size;
  }

  /** 线性位置 → 方格坐标；环形棋盘没有二维坐标 */
  to_grid(position: number): GridCoord | null {
    if (!this.is_grid || !this.is_valid_position(position)) return null;
    const cols = this.topology.tiles_per_side;
    return { x: position % cols, y: Math.floor(position / cols) };
  }

  from_grid(coord: GridCoord): number | null {
    if (!this.is_grid) return null;
    const cols = this.topology.tiles_per_side;
    if (coord.x < 0 || coord.y < 0 || coord.x >= cols || coord.y >= cols) return null;
    return coord.y * cols + coord.x;
  }

  is_special(position: number): boolean {
    if (!this.is_valid_position(position)) return false;
    if (this.is_grid) {
      const c = this.to_grid(position);
      if (!c) return false;
      const last = this.topology.tiles_per_side - 1;
      return (c.x === 0 || c.x === last) && (c.y === 0 || c.y === last);
    }
    const size = this.size;
    return (
      position === 0 ||
      position === Math.floor(size / 4) ||
      position === Math.floor(size / 2) ||
      position === Math.floor((size * 3) / 4)
    );
  }

  /** 优先级：start > goal > special > normal */
  classify(position: number): SpaceKind {
    if (position === 0) return 'start';
    if (position === this.goal_position()) return 'goal';
    if (this.is_special(position)) return 'special';
    return 'normal';
  }

  /** 方格：线性位置差的绝对值；环形：正反两个方向取较短者 */
  distance(a: number, b: number): number {
    if (this.is_grid || this.size === 0) return Math.abs(a - b);
    const size = this.size;
    const forward = (((b - a) % size) + size) % size;
    const backward = (((a - b) % size) + size) % size;
    return Math.min(forward, backward);
  }

  /**
   * 敌方棋子是否可见。
   * 隐藏规则下一律不可见；range = -1 不限距离；
   * 否则方格按坐标曼哈顿距离、环形按 distance() 比较。
   */
  can_see(viewer_position: number, target_position: number): boolean {
    if (!this.can_see_enemy_tokens) return false;
    if (this.visibility_range < 0) return true;
    return this.token_distance(viewer_position, target_position) <= this.visibility_range;
  }

  private token_distance(a: number, b: number): number {
    const ca = this.to_grid(a);
    const cb = this.to_grid(b);
    if (ca && cb) return Math.abs(ca.x - cb.x) + Math.abs(ca.y - cb.y);
    return this.distance(a, b);
  }
}
