import { issue } from '../schema';
import type { RulesType } from '../schema';
import type { PropertyLayoutEntry, PropertyRecord, ValidationIssue } from '../types';
import { next_int } from '../utils/rng.util';
import type { Rng } from '../utils/rng.util';

function rent_for(rules: RulesType, price: number): number {
  return Math.floor((price * rules.rent_percent) / 100);
}

/**
 * 程序化摆放地产：在 [1, size) 上抽 max(2, floor(size/4)) 次，抽到已用位置就跳过。
 * 第 i 块（按摆放顺序）价格 base + i·step，名字 `Property i+1`。
 */
export function place_properties(rules: RulesType, board_size: number, rng: Rng): PropertyRecord[] {
  if (board_size < 2) return [];
  const draws = Math.max(2, Math.floor(board_size / 4));
  const used = new Set<number>();
  const records: PropertyRecord[] = [];
  for (let d = 0; d < draws; d++) {
    const position = next_int(rng, 1, board_size - 1);
    if (used.has(position)) continue;
    used.add(position);
    const i = records.length;
    const price = rules.property_base_price + i * rules.property_price_step;
    records.push({ position, name: `Property ${i + 1}`, price, rent: rent_for(rules, price), owner: null });
  }
  return records;
}

/**
 * 显式布局：位置唯一、非 0、在棋盘内；价格/租金为非负整数。
 * 有任何问题都不返回记录。
 */
export function layout_properties(
  rules: RulesType,
  board_size: number,
  layout: PropertyLayoutEntry[],
): { records: PropertyRecord[]; errors: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const seen = new Set<number>();
  const records: PropertyRecord[] = [];

  layout.forEach((entry, i) => {
    const path = `/properties/${i}`;
    const { position, price } = entry;
    if (!Number.isInteger(position) || position < 1 || position >= board_size) {
      errors.push(issue('PROPERTY_LAYOUT_INVALID', `${path}/position`, `position ${position} must be in 1..${board_size - 1}`));
      return;
    }
    if (seen.has(position)) {
      errors.push(issue('PROPERTY_LAYOUT_INVALID', `${path}/position`, `position ${position} is used twice`));
      return;
    }
    seen.add(position);
    if (!Number.isInteger(price) || price < 0) {
      errors.push(issue('PROPERTY_LAYOUT_INVALID', `${path}/price`, `price ${price} must be a non-negative integer`));
      return;
    }
    const rent = entry.rent ?? rent_for(rules, price);
    if (!Number.isInteger(rent) || rent < 0) {
      errors.push(issue('PROPERTY_LAYOUT_INVALID', `${path}/rent`, `rent ${rent} must be a non-negative integer`));
      return;
    }
    records.push({ position, name: entry.name ?? `Property ${i + 1}`, price, rent, owner: null });
  });

  return errors.length ? { records: [], errors } : { records, errors };
}
