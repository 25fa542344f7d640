/** 三维缩放向量 */
export type Vec3 = {
  x: number;
  y: number;
  z: number;
};

/** RGBA 颜色，各通道取值 0~1 */
export type Rgba = {
  r: number;
  g: number;
  b: number;
  a: number;
};

/**
 * 被缩放的“变换”对象（由宿主持有，这里只引用）
 */
export interface ScaleTarget {
  getScale(): Vec3;
  setScale(scale: Vec3): void;
  /** 宿主对象可能已被销毁，每次写入前都要检查 */
  isAlive(): boolean;
}

/**
 * 可着色的视觉元素（图片类 / 文本类）
 */
export interface ColorVisual {
  getColor(): Rgba;
  setColor(color: Rgba): void;
  isAlive(): boolean;
}

export type VisualKind = "image" | "text";

/**
 * 子树枚举：按能力类别列出所有可着色元素（包括隐藏的）
 */
export interface VisualSource {
  collect(kind: VisualKind): Iterable<ColorVisual | null | undefined>;
}

export type PressEffectState = "idle" | "pressing" | "pressed" | "releasing";

/** 可被 FrameLoop 驱动的对象；返回 false 表示不再需要下一帧 */
export interface Tickable {
  tick(dt: number): boolean;
}
