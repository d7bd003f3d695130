/** 规则/构建阶段问题的统一表示（analyzer 与 composer 使用） */
export interface ValidationIssue {
  /** 机器可读错误码（如 SCHEMA_ERROR / TRADE_REQUIRES_PURCHASE / MODULE_DEPENDENCY）。 */
  code: string;
  /** JSON Pointer 风格路径（如 "/property_tradable"）。 */
  path: string;
  /** 人类可读消息（面向规则设计者/日志）。 */
  message: string;
  /** 可选：修复建议。 */
  hint?: string;
  /** 可选：互相冲突的字段名列表。 */
  fields?: string[];
}
