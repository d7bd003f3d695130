import type { ValidationIssue } from '../types';

export * from './rules.schema';
export * from './intent.schema';


/** 构造统一的校验问题对象（schema / analyzer / composer 复用） */
export function issue(
  code: string,
  path: string,
  message: string,
  extra?: { hint?: string; fields?: string[] }
): ValidationIssue {
  return { code, path, message, ...extra };
}
