/** 可复现的随机源：只暴露 uint32 序列与当前内部状态 */
export interface Rng {
  next_uint32(): number;
  readonly state: number;
}

/**
 * 同样的初始种子 → 完全一致的输出序列
 * @param seed
 * @returns
 */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return {
    next_uint32(): number {
      t += 0x6D2B79F5;
      let r = Math.imul(t ^ (t >>> 15), 1 | t);
      r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
      return ((r ^ (r >>> 14)) >>> 0);
    },
    get state(): number { return t >>> 0; }
  };
}

/**
 * 混合两个种子，生成新的种子（不同模块各用一条随机流，互不干扰）
 * @param base
 * @param salt
 * @returns
 */
export function mix_seed(base: number, salt: number): number { let x = (base ^ 0x9e3779b9) + (salt | 0); x ^= x << 13; x ^= x >>> 17; x ^= x << 5; return x >>> 0; }

/** 闭区间 [min, max] 内的整数；min === max 时不消耗随机数 */
export function next_int(rng: Rng, min: number, max: number): number {
  if (max <= min) return min;
  const span = max - min + 1;
  return min + (rng.next_uint32() % span);
}
