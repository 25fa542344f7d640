export type EventMap = Record<string, unknown[]>;

type Handler<A extends unknown[]> = (...args: A) => void;

export class EventBus<T extends EventMap> {
  private handlers: { [K in keyof T]?: Set<Handler<T[K]>> } = {};

  /** 订阅事件，返回取消订阅函数 */
  on<K extends keyof T>(event: K, handler: Handler<T[K]>): () => void {
    const set = this.handlers[event] ?? new Set<Handler<T[K]>>();
    set.add(handler);
    this.handlers[event] = set;
    return () => this.off(event, handler);
  }

  /** 取消订阅 */
  off<K extends keyof T>(event: K, handler: Handler<T[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /** 触发事件；单个订阅者抛错不影响其它订阅者 */
  emit<K extends keyof T>(event: K, ...args: T[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    [...set].forEach((h) => {
      try {
        h(...args);
      } catch (e) {
        console.error(`[EventBus] error in "${String(event)}":`, e);
      }
    });
  }

  /** 清空所有订阅 */
  clear(): void {
    this.handlers = {};
  }
}
