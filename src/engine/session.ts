import { compose_match } from '../composer';
import type {
  AnalysisOutput,
  ComposeInput,
  MatchSnapshot,
  MatchState,
  PlayerState,
  ResolveOutput,
  ValidationIssue,
} from '../types';
import { MatchEventBus } from './events';
import type { ListenerErrorHandler, MatchEventListener } from './events';
import { abort_match, resolve_intent } from './resolver';
import { snapshot_match } from './snapshot';

export interface MatchSessionOptions {
  /** 订阅者抛错时调用；意图的结算结果不受影响 */
  on_listener_error?: ListenerErrorHandler;
}

/**
 * 单局会话：对局状态的唯一写者。
 * 并发的 submit/abort 按到达顺序排进同一条 promise 队列，一次只结算一个意图；
 * 结算完成后才把事件发给订阅者。
 */
export class MatchSession {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly bus: MatchEventBus;

  constructor(
    private readonly match: MatchState,
    options: MatchSessionOptions = {},
  ) {
    this.bus = new MatchEventBus(options.on_listener_error);
  }

  submit(intent: unknown): Promise<ResolveOutput> {
    return this.enqueue(() => resolve_intent(this.match, intent));
  }

  /** 排在已提交的意图之后执行；中止后模块全部拆除 */
  abort(reason = 'aborted'): Promise<ResolveOutput> {
    return this.enqueue(() => abort_match(this.match, reason));
  }

  subscribe(listener: MatchEventListener): () => void {
    return this.bus.subscribe(listener);
  }

  get events(): MatchEventBus {
    return this.bus;
  }

  snapshot(): MatchSnapshot {
    return snapshot_match(this.match);
  }

  /**
   * viewer 视角下能看到的玩家（总包含自己）。
   * 看不见的敌方棋子整条不出现。
   */
  visible_players(viewer_id: number): PlayerState[] {
    const { roster } = this.match;
    const board = this.match.modules?.board ?? null;
    const viewer = roster.has(viewer_id) ? roster.get(viewer_id) : null;
    return roster.players
      .filter((p) => {
        if (p.id === viewer_id) return true;
        if (!viewer || !board) return false;
        return board.can_see(viewer.position, p.position);
      })
      .map((p) => ({ ...p, owned_positions: [...p.owned_positions] }));
  }

  private enqueue(task: () => ResolveOutput): Promise<ResolveOutput> {
    const run = this.queue.then(() => {
      const out = task();
      if (out.ok) this.bus.publish(out.events);
      return out;
    });
    // 前一个任务失败不影响后续排队；失败本身仍然交给调用方
    this.queue = run.catch(() => undefined);
    return run;
  }
}

export type OpenSessionOutput =
  | { ok: true; session: MatchSession; analysis: AnalysisOutput; warnings: ValidationIssue[] }
  | { ok: false; session: null; analysis: AnalysisOutput | null; errors: ValidationIssue[]; warnings: ValidationIssue[] };

/** compose_match + MatchSession */
export function open_session(input: ComposeInput, options: MatchSessionOptions = {}): OpenSessionOutput {
  const composed = compose_match(input);
  if (!composed.ok) {
    return { ok: false, session: null, analysis: composed.analysis, errors: composed.errors, warnings: composed.warnings };
  }
  return { ok: true, session: new MatchSession(composed.match, options), analysis: composed.analysis, warnings: composed.warnings };
}
