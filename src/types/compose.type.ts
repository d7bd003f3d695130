import type { AnalysisOutput } from './analysis.type';
import type { ValidationIssue } from './issue.type';
import type { MatchState } from './match.type';

/** 显式地产布局（来自存档的棋盘布局）；缺省时由种子程序化生成 */
export interface PropertyLayoutEntry {
  position: number;
  name?: string;
  price: number;
  /** 缺省按 rent_percent 计算 */
  rent?: number;
}

/** 开一局的入参 */
export interface ComposeInput {
  /** 规则文档（未解析的 JSON 对象或已解析的规则） */
  rules: unknown;
  /** 请求人数，会被夹到 [min_players, max_players]；缺省用 analyzer 推荐值 */
  players?: number;
  /**
   * 随机种子（uint32 语义）。
   * 地产摆放与战斗伤害的随机都只来源于此。
   */
  seed?: number;
  properties?: PropertyLayoutEntry[];
}

/** 开局输出：失败时 match 为 null，不会暴露半成品 */
export type ComposeOutput =
  | { ok: true; match: MatchState; analysis: AnalysisOutput; errors: []; warnings: ValidationIssue[] }
  | { ok: false; match: null; analysis: AnalysisOutput | null; errors: ValidationIssue[]; warnings: ValidationIssue[] };
