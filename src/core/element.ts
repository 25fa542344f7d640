import type { FabricObject } from "fabric";
import { nextId } from "./utils";
import { Bag } from "./bag";
import type { Behavior } from "./behavior";
import type { SceneEvent, ScenePointerEvent } from "./events";
import type { Scene } from "./scene";

export type ElementMeta = {
  id?: string;
  type?: string;
};

export const elementMetaBag = new Bag<ElementMeta>("element-meta");

export function getElementMetaFromObject(obj: FabricObject): ElementMeta | undefined {
  return elementMetaBag.get(obj);
}

export function ensureElementMetaOnObject(obj: FabricObject, patch?: ElementMeta) {
  const meta = elementMetaBag.ensure(obj, () => ({}));
  if (patch?.id != null) meta.id = patch.id;
  if (patch?.type != null) meta.type = patch.type;
  return meta;
}

export type ElementOptions<TObj extends FabricObject = FabricObject> = {
  obj: TObj;
  /**
   * 语义类型（业务无关）：例如 "button" / "card" / "icon" ...
   */
  type: string;
  id?: string;
};

/**
 * Element：对 FabricObject 的面向对象封装（把“语义/职责/交互”抽象出来）
 */
export class Element<TObj extends FabricObject = FabricObject> {
  readonly obj: TObj;
  readonly type: string;
  readonly id: string;

  scene: Scene | null = null;
  private behaviors: Behavior[] = [];

  constructor(opts: ElementOptions<TObj>) {
    this.obj = opts.obj;
    this.type = opts.type;
    this.id = opts.id ?? getElementMetaFromObject(this.obj)?.id ?? nextId("el");
    ensureElementMetaOnObject(this.obj, { id: this.id, type: this.type });
  }

  get meta(): ElementMeta {
    return ensureElementMetaOnObject(this.obj);
  }

  /**
   * 绑定到场景（由 Scene 调用）
   */
  _attach(scene: Scene) {
    this.scene = scene;
    this.behaviors.forEach((b) => b.onAttach?.(this));
  }

  /**
   * 从场景解绑（由 Scene 调用）
   */
  _detach() {
    this.behaviors.forEach((b) => b.onDetach?.(this));
    this.scene = null;
  }

  addBehavior(b: Behavior) {
    this.behaviors.push(b);
    if (this.scene) b.onAttach?.(this);
    return this;
  }

  removeBehavior(predicate: (b: Behavior) => boolean) {
    const removed: Behavior[] = [];
    this.behaviors = this.behaviors.filter((b) => {
      if (!predicate(b)) return true;
      removed.push(b);
      return false;
    });
    if (this.scene) removed.forEach((b) => b.onDetach?.(this));
    return this;
  }

  getBehaviors() {
    return [...this.behaviors];
  }

  /** 按类型查找已挂载的 behavior */
  findBehavior<B extends Behavior>(ctor: new (...args: never[]) => B): B | undefined {
    for (const b of this.behaviors) {
      if (b instanceof ctor) return b;
    }
    return undefined;
  }

  /**
   * Scene 事件分发入口（由 Scene 调用）
   */
  _handleSceneEvent(ev: SceneEvent) {
    switch (ev.name) {
      case "pointer:down":
        if (this.onPointerDown?.(ev) === true) return true;
        break;
      case "pointer:up":
        if (this.onPointerUp?.(ev) === true) return true;
        break;
    }

    for (const b of this.behaviors) {
      if (b.onSceneEvent?.(this, ev) === true) return true;
    }
    return false;
  }

  // ---------------------------
  // 可覆盖的交互钩子
  // ---------------------------
  onPointerDown?(ev: ScenePointerEvent): boolean | void;
  onPointerUp?(ev: ScenePointerEvent): boolean | void;
}
