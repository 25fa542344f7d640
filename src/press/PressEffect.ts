import { PressAnimation, ReleaseAnimation, type AnimationContext, type AnimationSession } from "./animations";
import { VisualBinder } from "./binder";
import { OriginalColorCache } from "./colorCache";
import { EventBus } from "./EventBus";
import { resolvePressEffectOptions, type PressEffectOptions, type ResolvedPressEffectOptions } from "./options";
import type { PressEffectState, ScaleTarget, Tickable, Vec3, VisualSource } from "./types";

export type PressEffectEvents = {
  "state:change": [state: PressEffectState, prev: PressEffectState];
  bind: [effect: PressEffect];
};

export type PressEffectInit = PressEffectOptions & {
  /** 子树枚举；为空时只有 include 列表里的元素参与 */
  source?: VisualSource | null;
  /** target 未显式给出时使用的对象（“自身”） */
  self?: ScaleTarget | null;
  /**
   * 会话开始时回调（通常用来把自己挂到 FrameLoop 上）
   */
  onSessionStart?: (effect: PressEffect) => void;
};

/**
 * 按下/松开反馈效果：
 * - pointerDown：缩小到 restingScale * scaleAmount，颜色乘以 pressedColorMultiplier
 * - pointerUp：punch 回弹到 restingScale，颜色回到原始值
 *
 * 本身不持有任何定时器，由宿主每帧调用 tick(dt)。
 */
export class PressEffect implements Tickable {
  readonly events = new EventBus<PressEffectEvents>();
  readonly options: ResolvedPressEffectOptions;
  readonly binder: VisualBinder;
  readonly cache = new OriginalColorCache();

  private readonly target: ScaleTarget | null;
  private readonly restingScale: Vec3 | null;
  private readonly onSessionStart?: (effect: PressEffect) => void;
  private session: AnimationSession | null = null;
  private _state: PressEffectState = "idle";
  private _active = true;

  constructor(init: PressEffectInit) {
    this.options = resolvePressEffectOptions(init);
    this.target = init.target ?? init.self ?? null;
    this.restingScale = this.target?.isAlive() ? { ...this.target.getScale() } : null;
    this.onSessionStart = init.onSessionStart;

    this.binder = new VisualBinder(
      init.source ?? null,
      { include: init.includeImages, exclude: init.excludeImages },
      { include: init.includeTexts, exclude: init.excludeTexts },
    );
    this.bindVisuals();
  }

  get state() {
    return this._state;
  }

  get active() {
    return this._active;
  }

  get running() {
    return this.session != null;
  }

  /**
   * 重新扫描子树并重建原始颜色缓存（可以在编辑器里手动触发）
   */
  rebind() {
    this.bindVisuals();
    this.events.emit("bind", this);
  }

  pointerDown() {
    const ctx = this.animationContext();
    if (!ctx) return;
    this.start(new PressAnimation(ctx), "pressing");
  }

  pointerUp() {
    const ctx = this.animationContext();
    if (!ctx) return;
    this.start(new ReleaseAnimation(ctx), "releasing");
  }

  /**
   * 推进当前会话一帧；返回 false 表示已经没有需要推进的动画
   */
  tick(dt: number): boolean {
    const session = this.session;
    if (!session) return false;

    if (session.step(dt)) {
      this.session = null;
      this.setState(session.kind === "press" ? "pressed" : "idle");
      return false;
    }
    return true;
  }

  /** 取消当前会话（不回滚中间值） */
  cancel() {
    this.session = null;
  }

  /**
   * 失活：取消会话，强制回到静止缩放和原始颜色
   */
  deactivate() {
    this.cancel();
    this._active = false;

    if (this.target?.isAlive() && this.restingScale) {
      this.target.setScale({ ...this.restingScale });
    }
    this.cache.restore();
    this.setState("idle");
  }

  activate() {
    this._active = true;
  }

  private bindVisuals() {
    this.binder.bind();
    this.cache.capture(this.binder.all());
  }

  /** 失活或没有可用 target 时返回 null，指针事件随之变成空操作 */
  private animationContext(): AnimationContext | null {
    const { target, restingScale } = this;
    if (!this._active || !target || !restingScale || !target.isAlive()) return null;
    return {
      target,
      restingScale,
      binder: this.binder,
      cache: this.cache,
      options: this.options,
    };
  }

  private start(session: AnimationSession, state: PressEffectState) {
    this.cancel();
    this.session = session;
    this.setState(state);
    this.onSessionStart?.(this);
  }

  private setState(next: PressEffectState) {
    const prev = this._state;
    if (prev === next) return;
    this._state = next;
    this.events.emit("state:change", next, prev);
  }
}
