import type { ColorVisual, VisualKind, VisualSource } from "./types";

type Maybe<T> = T | null | undefined;

export type BindLists = {
  include?: Array<Maybe<ColorVisual>>;
  exclude?: Array<Maybe<ColorVisual>>;
};

/** 去掉空值、已失效项和重复项（按引用） */
export function uniqueVisuals(list: Iterable<Maybe<ColorVisual>>): ColorVisual[] {
  const seen = new Set<ColorVisual>();
  for (const v of list) {
    if (v == null || !v.isAlive()) continue;
    seen.add(v);
  }
  return [...seen];
}

/**
 * 计算某一类别的绑定集合：子树扫描 + include - exclude
 */
export function collectBound(source: VisualSource | null, kind: VisualKind, lists?: BindLists): ColorVisual[] {
  const found = source ? [...source.collect(kind)] : [];
  const all = uniqueVisuals([...found, ...(lists?.include ?? [])]);

  const exclude = new Set(uniqueVisuals(lists?.exclude ?? []));
  if (exclude.size === 0) return all;
  return all.filter((v) => !exclude.has(v));
}

/**
 * 绑定结果：图片类 + 文本类两个集合
 */
export class VisualBinder {
  images: ColorVisual[] = [];
  texts: ColorVisual[] = [];

  constructor(
    private source: VisualSource | null,
    private imageLists?: BindLists,
    private textLists?: BindLists,
  ) {}

  bind() {
    this.images = collectBound(this.source, "image", this.imageLists);
    this.texts = collectBound(this.source, "text", this.textLists);
  }

  /** 所有绑定元素（图片在前） */
  all(): ColorVisual[] {
    return [...this.images, ...this.texts];
  }
}
