import type { Tickable } from "./types";

export type FrameScheduler = {
  requestFrame: (cb: (time: number) => void) => number;
  cancelFrame: (id: number) => void;
  /** 毫秒 */
  now: () => number;
};

export type FrameLoopOptions = {
  scheduler?: FrameScheduler;
  /** 每帧所有 tickable 推进完之后调用一次（例如 canvas.requestRenderAll） */
  onFrame?: () => void;
};

export function browserFrameScheduler(): FrameScheduler {
  return {
    requestFrame: (cb) => requestAnimationFrame(cb),
    cancelFrame: (id) => cancelAnimationFrame(id),
    now: () => performance.now(),
  };
}

/**
 * 用一条 rAF 链驱动任意多个 Tickable；没有活跃对象时自动停下
 */
export class FrameLoop {
  private readonly scheduler: FrameScheduler;
  private readonly onFrame?: () => void;
  private readonly items = new Set<Tickable>();
  private raf: number | null = null;
  private lastTime: number | null = null;

  constructor(opts?: FrameLoopOptions) {
    this.scheduler = opts?.scheduler ?? browserFrameScheduler();
    this.onFrame = opts?.onFrame;
  }

  get size() {
    return this.items.size;
  }

  get running() {
    return this.raf != null;
  }

  add(item: Tickable) {
    this.items.add(item);
    if (this.raf == null) {
      this.lastTime = this.scheduler.now();
      this.schedule();
    }
  }

  remove(item: Tickable) {
    this.items.delete(item);
    if (this.items.size === 0) this.stop();
  }

  dispose() {
    this.items.clear();
    this.stop();
  }

  private schedule() {
    this.raf = this.scheduler.requestFrame(this.frame);
  }

  private stop() {
    if (this.raf != null) this.scheduler.cancelFrame(this.raf);
    this.raf = null;
    this.lastTime = null;
  }

  private frame = (time: number) => {
    this.raf = null;
    const last = this.lastTime ?? time;
    const dt = Math.max(0, time - last) / 1000;
    this.lastTime = time;

    [...this.items].forEach((item) => {
      let keep = false;
      try {
        keep = item.tick(dt);
      } catch (e) {
        console.error("[FrameLoop] tick failed, item dropped:", e);
      }
      if (!keep) this.items.delete(item);
    });

    this.onFrame?.();

    if (this.items.size > 0) this.schedule();
    else this.lastTime = null;
  };
}
