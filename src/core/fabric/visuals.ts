import { FabricImage, FabricText, Group } from "fabric";
import type { FabricObject } from "fabric";
import type { ColorVisual, Rgba, VisualKind, VisualSource } from "../../press/types";
import { formatFill, parseFill } from "./color";

/** obj 是否还在 root 的子树里（root 自身也算） */
export function isInSubtree(obj: FabricObject, root: FabricObject) {
  let cur: FabricObject | undefined = obj;
  while (cur) {
    if (cur === root) return true;
    cur = cur.group;
  }
  return false;
}

/** 还挂在场景里：仍在 root 子树中，或者仍在某个 canvas 上 */
export function isAttached(obj: FabricObject, root: FabricObject) {
  return isInSubtree(obj, root) || obj.canvas != null;
}

/** 深度优先遍历子树（包括 root 自身和不可见对象） */
export function* walkSubtree(root: FabricObject): Generator<FabricObject> {
  yield root;
  if (root instanceof Group) {
    for (const child of root.getObjects()) yield* walkSubtree(child);
  }
}

function hasColorFill(obj: FabricObject): obj is FabricObject & { fill: string } {
  return typeof obj.fill === "string" && obj.fill.length > 0;
}

/**
 * 判断对象属于哪一类可着色元素：
 * - text：FabricText 及其子类（IText / Textbox）
 * - image：其余纯色填充的图形（Rect / Circle / Path ...）
 * group 本身不绘制 fill，位图没有可调的颜色，二者都不参与。
 */
export function visualKindOf(obj: FabricObject): VisualKind | null {
  if (obj instanceof Group || obj instanceof FabricImage) return null;
  if (!hasColorFill(obj)) return null;
  return obj instanceof FabricText ? "text" : "image";
}

/**
 * 把 FabricObject 的 fill 当作 ColorVisual。
 * 写回的颜色如果和读到过的某个原始 fill 一致，就写回那个原始字符串（"#fff" 不会变成 "rgba(...)"）。
 */
export class FabricVisual implements ColorVisual {
  /** formatFill 结果 -> 读到时的原始 fill 写法 */
  private authored = new Map<string, string>();

  constructor(
    readonly obj: FabricObject,
    private readonly root: FabricObject,
  ) {}

  getColor(): Rgba {
    if (!hasColorFill(this.obj)) return { r: 0, g: 0, b: 0, a: 0 };
    const fill = this.obj.fill;
    const color = parseFill(fill);
    const normalized = formatFill(color);
    if (normalized !== fill) this.authored.set(normalized, fill);
    return color;
  }

  setColor(color: Rgba) {
    const normalized = formatFill(color);
    this.obj.set("fill", this.authored.get(normalized) ?? normalized);
    // group 默认开启缓存，子对象改色后需要让祖先重绘
    let g = this.obj.group;
    while (g) {
      g.dirty = true;
      g = g.group;
    }
  }

  /** 已离开场景、或 fill 变成渐变/图案，都视为失效 */
  isAlive() {
    return hasColorFill(this.obj) && isAttached(this.obj, this.root);
  }
}

/**
 * 以某个 FabricObject 为根的子树枚举。
 * 同一个对象始终返回同一个 FabricVisual，exclude 列表才能按引用生效。
 */
export class FabricVisualSource implements VisualSource {
  private visuals = new Map<FabricObject, FabricVisual>();

  constructor(readonly root: FabricObject) {}

  visualFor(obj: FabricObject | null | undefined): FabricVisual | null {
    if (!obj) return null;
    let v = this.visuals.get(obj);
    if (!v) {
      v = new FabricVisual(obj, this.root);
      this.visuals.set(obj, v);
    }
    return v;
  }

  *collect(kind: VisualKind): Generator<FabricVisual | null> {
    for (const obj of walkSubtree(this.root)) {
      if (visualKindOf(obj) === kind) yield this.visualFor(obj);
    }
  }
}
