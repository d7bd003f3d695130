import type { MatchEvent, MatchEventType } from '../types';

export type MatchEventOf<K extends MatchEventType> = Extract<MatchEvent, { type: K }>;

export type MatchEventListener = (event: MatchEvent) => void;

/** 监听器抛错时的去处；缺省打到 stderr */
export type ListenerErrorHandler = (error: unknown, event: MatchEvent) => void;

const report_to_console: ListenerErrorHandler = (error, event) => {
  console.error(`[MatchEventBus] listener failed on ${event.type} (seq ${event.seq}):`, error);
};

function is_event<K extends MatchEventType>(event: MatchEvent, type: K): event is MatchEventOf<K> {
  return event.type === type;
}

/**
 * 对局事件总线。表现层/网络层只通过这里拿到事件。
 * 监听器按注册顺序同步调用；发布期间的退订在下一次发布生效。
 * 单个监听器抛错只交给 on_error，不影响其他监听器，也不影响已经结算的意图。
 */
export class MatchEventBus {
  private listeners: MatchEventListener[] = [];

  constructor(private readonly on_error: ListenerErrorHandler = report_to_console) {}

  /** 订阅全部事件；返回退订函数 */
  subscribe(listener: MatchEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /** 只订阅某一类事件 */
  on<K extends MatchEventType>(type: K, listener: (event: MatchEventOf<K>) => void): () => void {
    return this.subscribe((event) => {
      if (is_event(event, type)) listener(event);
    });
  }

  publish(events: MatchEvent[]): void {
    const listeners = [...this.listeners];
    for (const event of events) {
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          this.on_error(error, event);
        }
      }
    }
  }

  listener_count(): number {
    return this.listeners.length;
  }

  clear(): void {
    this.listeners = [];
  }
}
