import type { VisualBinder } from "./binder";
import { snapshotColors, type OriginalColorCache } from "./colorCache";
import { clamp01, easeOutSine01, lerpRgba, lerpVec3, multiplyRgb, punchOffset, scaleVec3 } from "./math";
import type { ResolvedPressEffectOptions } from "./options";
import type { ColorVisual, Rgba, ScaleTarget, Vec3 } from "./types";

export type AnimationContext = {
  target: ScaleTarget;
  restingScale: Vec3;
  binder: VisualBinder;
  cache: OriginalColorCache;
  options: ResolvedPressEffectOptions;
};

export type AnimationKind = "press" | "release";

function sanitizeDelta(dt: number) {
  return Number.isFinite(dt) && dt > 0 ? dt : 0;
}

/**
 * 一段动画会话：由外部逐帧 step(dt) 推进，结束时把数值精确落到终点。
 * 被新会话取代时直接丢弃即可，不回滚中间值。
 */
export abstract class AnimationSession {
  abstract readonly kind: AnimationKind;
  protected elapsed = 0;
  protected readonly startColors: Map<ColorVisual, Rgba>;
  private done = false;

  constructor(protected readonly ctx: AnimationContext) {
    this.startColors = snapshotColors(ctx.binder.all());
  }

  get finished() {
    return this.done;
  }

  /**
   * 推进一帧；返回 true 表示已经结束
   */
  step(dt: number): boolean {
    if (this.done) return true;
    this.elapsed += sanitizeDelta(dt);

    if (this.elapsed >= this.duration) {
      this.done = true;
      this.complete();
      return true;
    }
    this.apply(this.elapsed / this.duration);
    return false;
  }

  protected abstract get duration(): number;
  protected abstract apply(rawT: number): void;
  protected abstract complete(): void;

  protected writeScale(scale: Vec3) {
    const { target } = this.ctx;
    if (target.isAlive()) target.setScale(scale);
  }
}

/**
 * 按下：缩小 + 变暗，ease-out sine
 */
export class PressAnimation extends AnimationSession {
  readonly kind = "press";
  private readonly startScale: Vec3;

  constructor(ctx: AnimationContext) {
    super(ctx);
    this.startScale = { ...ctx.target.getScale() };
  }

  protected get duration() {
    return this.ctx.options.duration;
  }

  private get endScale() {
    return scaleVec3(this.ctx.restingScale, this.ctx.options.scaleAmount);
  }

  private pressedColorOf(v: ColorVisual, fallback: Rgba) {
    const original = this.ctx.cache.get(v) ?? fallback;
    return multiplyRgb(original, this.ctx.options.pressedColorMultiplier);
  }

  protected apply(rawT: number) {
    const t = easeOutSine01(rawT);
    this.writeScale(lerpVec3(this.startScale, this.endScale, t));

    this.startColors.forEach((start, v) => {
      if (!v.isAlive()) return;
      v.setColor(lerpRgba(start, this.pressedColorOf(v, start), t));
    });
  }

  protected complete() {
    this.writeScale(this.endScale);

    for (const v of this.ctx.binder.all()) {
      if (!v.isAlive()) continue;
      const original = this.ctx.cache.get(v);
      if (original) v.setColor(multiplyRgb(original, this.ctx.options.pressedColorMultiplier));
    }
  }
}

/**
 * 松开：一个完整的衰减正弦周期（punch），颜色线性回到原始值
 */
export class ReleaseAnimation extends AnimationSession {
  readonly kind = "release";

  protected get duration() {
    return this.ctx.options.punchDuration;
  }

  protected apply(rawT: number) {
    const t = clamp01(rawT);
    const punch = punchOffset(t, this.ctx.options.punchStrength);
    this.writeScale(scaleVec3(this.ctx.restingScale, 1 + punch));

    this.startColors.forEach((start, v) => {
      if (!v.isAlive()) return;
      const original = this.ctx.cache.get(v);
      if (original) v.setColor(lerpRgba(start, original, t));
    });
  }

  protected complete() {
    this.writeScale({ ...this.ctx.restingScale });
    this.ctx.cache.restore();
  }
}
