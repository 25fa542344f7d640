import type { Rgba, Vec3 } from "./types";

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n));
}

export function clamp01(n: number) {
  return clamp(n, 0, 1);
}

export function lerp(a: number, b: number, t: number) {
  return a + (b - a) * t;
}

/** ease-out sine：起步快、收尾慢 */
export function easeOutSine01(t: number) {
  return Math.sin(clamp01(t) * Math.PI * 0.5);
}

/**
 * 衰减的一个完整正弦周期：t=0 与 t=1 时都为 0
 */
export function punchOffset(t: number, strength: number) {
  return Math.sin(t * Math.PI * 2) * (1 - t) * strength;
}

export function scaleVec3(v: Vec3, k: number): Vec3 {
  return { x: v.x * k, y: v.y * k, z: v.z * k };
}

export function lerpVec3(a: Vec3, b: Vec3, t: number): Vec3 {
  return { x: lerp(a.x, b.x, t), y: lerp(a.y, b.y, t), z: lerp(a.z, b.z, t) };
}

export function lerpRgba(a: Rgba, b: Rgba, t: number): Rgba {
  return {
    r: lerp(a.r, b.r, t),
    g: lerp(a.g, b.g, t),
    b: lerp(a.b, b.b, t),
    a: lerp(a.a, b.a, t),
  };
}

/** 只乘 RGB，alpha 保持不变 */
export function multiplyRgb(c: Rgba, mul: number): Rgba {
  return { r: c.r * mul, g: c.g * mul, b: c.b * mul, a: c.a };
}
