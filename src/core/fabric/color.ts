import { Color } from "fabric";
import type { Rgba } from "../../press/types";

/**
 * fill 字符串 -> 0~1 的 RGBA（依赖 fabric 的 Color 解析 hex / rgb / hsl / 颜色名）
 */
export function parseFill(fill: string): Rgba {
  const [r, g, b, a] = new Color(fill).getSource();
  return { r: r / 255, g: g / 255, b: b / 255, a };
}

function clampUnit(n: number) {
  return Math.max(0, Math.min(1, n));
}

function toByte(n: number) {
  return Math.round(clampUnit(n) * 255);
}

/**
 * 0~1 的 RGBA -> "rgba(r,g,b,a)"；RGB 量化到 0~255 整数，alpha 原样保留
 * （小于 1e-6 的 alpha 记为 0，避免写出 fabric 解析不了的指数形式）
 */
export function formatFill(c: Rgba): string {
  const alpha = clampUnit(c.a);
  return new Color([toByte(c.r), toByte(c.g), toByte(c.b), alpha < 1e-6 ? 0 : alpha]).toRgba();
}
