import { clamp } from "./math";
import type { ColorVisual, ScaleTarget } from "./types";

export type PressEffectOptions = {
  /**
   * 被缩放的对象；不传时由宿主决定（fabric 下默认是元素自身）
   */
  target?: ScaleTarget | null;

  /** 额外纳入绑定的元素（在子树扫描结果之外） */
  includeImages?: Array<ColorVisual | null | undefined>;
  includeTexts?: Array<ColorVisual | null | undefined>;

  /** 从绑定集合里排除的元素，永远不会被改色 */
  excludeImages?: Array<ColorVisual | null | undefined>;
  excludeTexts?: Array<ColorVisual | null | undefined>;

  // pointer down
  scaleAmount?: number;
  /** 秒 */
  duration?: number;

  // pointer up
  punchStrength?: number;
  /** 秒 */
  punchDuration?: number;

  /** 按下时 RGB 乘数，0~1 */
  pressedColorMultiplier?: number;
};

export type ResolvedPressEffectOptions = {
  scaleAmount: number;
  duration: number;
  punchStrength: number;
  punchDuration: number;
  pressedColorMultiplier: number;
};

export const DEFAULT_PRESS_EFFECT_OPTIONS: Readonly<ResolvedPressEffectOptions> = {
  scaleAmount: 0.95,
  duration: 0.1,
  punchStrength: 0.08,
  punchDuration: 0.15,
  pressedColorMultiplier: 0.85,
};

/** NaN / Infinity 会让会话永远结束不了，按未设置处理 */
function finiteOr(value: number | undefined, fallback: number) {
  return value != null && Number.isFinite(value) ? value : fallback;
}

export function resolvePressEffectOptions(opts?: PressEffectOptions): ResolvedPressEffectOptions {
  const d = DEFAULT_PRESS_EFFECT_OPTIONS;
  return {
    scaleAmount: finiteOr(opts?.scaleAmount, d.scaleAmount),
    duration: finiteOr(opts?.duration, d.duration),
    punchStrength: finiteOr(opts?.punchStrength, d.punchStrength),
    punchDuration: finiteOr(opts?.punchDuration, d.punchDuration),
    pressedColorMultiplier: clamp(finiteOr(opts?.pressedColorMultiplier, d.pressedColorMultiplier), 0, 1),
  };
}
