import type { RulesType } from '../schema';
import type { ValidationIssue } from './issue.type';

/** 规则能组装出的对局形态 */
export type Archetype = 'trading' | 'grid_combat' | 'race' | 'hybrid';

export const ARCHETYPES: readonly Archetype[] = ['trading', 'grid_combat', 'race', 'hybrid'];

/** analyze_rules() 输出：纯函数，同一份规则永远得到同一结果 */
export interface AnalysisOutput {
  archetype: Archetype;
  /** 存在任何冲突时为 false（此时 archetype 固定为 hybrid） */
  valid: boolean;
  /** 致命冲突：每条都指明冲突字段 */
  conflicts: ValidationIssue[];
  /** 非致命告警 */
  warnings: ValidationIssue[];
  /** 规则文档的稳定哈希（sha256:...） */
  rules_id: string;
  /** 未指定人数时采用的人数（已夹在 min/max 之间） */
  recommended_players: number;
}

/** analyze_document() 输出：先做 schema 解析，再做分析 */
export type AnalyzeDocumentOutput =
  | { ok: true; rules: RulesType; analysis: AnalysisOutput; errors: ValidationIssue[] }
  | { ok: false; rules: RulesType | null; analysis: AnalysisOutput | null; errors: ValidationIssue[] };
