import type { ColorVisual, Rgba } from "./types";

/**
 * 原始颜色缓存：每次 bind 清空重建
 */
export class OriginalColorCache {
  private colors = new Map<ColorVisual, Rgba>();

  capture(visuals: Iterable<ColorVisual>) {
    this.colors.clear();
    for (const v of visuals) {
      if (!v.isAlive()) continue;
      // 同一轮里先写入者为准
      if (!this.colors.has(v)) this.colors.set(v, { ...v.getColor() });
    }
  }

  get(v: ColorVisual): Rgba | undefined {
    return this.colors.get(v);
  }

  has(v: ColorVisual) {
    return this.colors.has(v);
  }

  get size() {
    return this.colors.size;
  }

  entries(): Array<[ColorVisual, Rgba]> {
    return [...this.colors.entries()];
  }

  /** 把缓存颜色写回；已失效的元素直接跳过 */
  restore() {
    this.colors.forEach((color, v) => {
      if (v.isAlive()) v.setColor({ ...color });
    });
  }
}

/**
 * 动画开始时的颜色快照（可能不等于原始颜色，例如上一段动画被打断）
 */
export function snapshotColors(visuals: Iterable<ColorVisual>): Map<ColorVisual, Rgba> {
  const out = new Map<ColorVisual, Rgba>();
  for (const v of visuals) {
    if (!v.isAlive()) continue;
    out.set(v, { ...v.getColor() });
  }
  return out;
}
