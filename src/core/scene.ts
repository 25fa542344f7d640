import type { FabricObject } from "fabric";
import { EventBus } from "../press/EventBus";
import { FrameLoop, type FrameScheduler } from "../press/FrameLoop";
import { Element, getElementMetaFromObject } from "./element";
import type { SceneCanvasEventInfo, ScenePointerEvent, ScenePointerEventName } from "./events";

export type SceneCanvasEventName = "mouse:down" | "mouse:up" | "object:added" | "object:removed";

type SceneCanvasHandler = (raw: SceneCanvasEventInfo) => void;

/**
 * Scene 需要的画布能力（fabric Canvas 天然满足；测试里可以用一个小的事件源代替）
 */
export interface SceneCanvas {
  on(eventName: SceneCanvasEventName, handler: SceneCanvasHandler): unknown;
  off(eventName: SceneCanvasEventName, handler: SceneCanvasHandler): unknown;
  requestRenderAll(): void;
}

export type SceneOptions = {
  /**
   * 是否在 canvas object:added 时，自动把带元信息的对象 wrap 成 Element
   */
  autoWrapFromObjectMeta?: boolean;
  /**
   * 帧调度（默认 requestAnimationFrame）
   */
  frameScheduler?: FrameScheduler;
};

export type SceneEventMap = {
  "element:added": [payload: { scene: Scene; element: Element }];
  "element:removed": [payload: { scene: Scene; element: Element }];
};

/**
 * Scene：上层框架的核心运行时
 * - 管理元素生命周期（add/remove/find）
 * - 统一事件路由（Fabric -> Element/Behavior）
 * - 持有一个 FrameLoop，动画帧结束后请求重绘
 */
export class Scene {
  readonly canvas: SceneCanvas;
  readonly loop: FrameLoop;

  private byObject = new Map<FabricObject, Element>();
  private byId = new Map<string, Element>();

  /** 收到 pointer:down 的元素；pointer:up 总是发给它，即使在别处松开 */
  private pressed: Element | null = null;

  private disposer: (() => void) | null = null;
  private events = new EventBus<SceneEventMap>();
  private opts: Required<Pick<SceneOptions, "autoWrapFromObjectMeta">>;

  constructor(canvas: SceneCanvas, opts?: SceneOptions) {
    this.canvas = canvas;
    this.opts = {
      autoWrapFromObjectMeta: opts?.autoWrapFromObjectMeta !== false,
    };
    this.loop = new FrameLoop({
      scheduler: opts?.frameScheduler,
      onFrame: () => this.canvas.requestRenderAll(),
    });

    this.attachCanvasEvents();
  }

  dispose() {
    this.disposer?.();
    this.disposer = null;
    this.byObject.forEach((el) => el._detach());
    this.byObject.clear();
    this.byId.clear();
    this.pressed = null;
    this.loop.dispose();
    this.events.clear();
  }

  on<N extends keyof SceneEventMap>(name: N, fn: (...args: SceneEventMap[N]) => void) {
    return this.events.on(name, fn);
  }

  off<N extends keyof SceneEventMap>(name: N, fn: (...args: SceneEventMap[N]) => void) {
    this.events.off(name, fn);
  }

  add(el: Element) {
    if (this.byId.has(el.id)) throw new Error(`Element id already exists: ${el.id}`);
    this.byObject.set(el.obj, el);
    this.byId.set(el.id, el);
    el._attach(this);
    this.events.emit("element:added", { scene: this, element: el });
    return el;
  }

  remove(elOrId: Element | string) {
    const el = typeof elOrId === "string" ? this.byId.get(elOrId) : elOrId;
    if (!el || this.byId.get(el.id) !== el) return;

    if (this.pressed === el) this.pressed = null;
    this.byObject.delete(el.obj);
    this.byId.delete(el.id);
    el._detach();
    this.events.emit("element:removed", { scene: this, element: el });
  }

  findById(id: string) {
    return this.byId.get(id) ?? null;
  }

  findByObject(obj: FabricObject | undefined | null) {
    if (!obj) return null;
    return this.byObject.get(obj) ?? null;
  }

  /**
   * 命中的可能是 group 里的子对象（subTargetCheck），沿 group 链向上找到已注册的元素
   */
  findClosest(obj: FabricObject | undefined | null) {
    let cur: FabricObject | undefined | null = obj;
    while (cur) {
      const el = this.byObject.get(cur);
      if (el) return el;
      cur = cur.group;
    }
    return null;
  }

  /**
   * 当某个对象“先进入 canvas、后补上元信息”时，用它来补一次注册。
   * 返回已存在/新创建的 Element；如果对象没有足够的元信息则返回 null。
   */
  ensureElementFromObject(obj: FabricObject) {
    const existed = this.findByObject(obj);
    if (existed) return existed;
    const meta = getElementMetaFromObject(obj);
    if (!meta?.id || !meta?.type) return null;

    const byId = this.findById(meta.id);
    if (byId) {
      if (byId.obj !== obj) console.warn(`[Scene] id "${meta.id}" already taken, object not wrapped`);
      return byId.obj === obj ? byId : null;
    }
    return this.add(new Element({ obj, type: meta.type, id: meta.id }));
  }

  /**
   * 把一个 FabricObject 包装成 Element 并注册到 Scene
   */
  wrapAndAdd<TObj extends FabricObject>(obj: TObj, type = "fabric") {
    const existed = this.findByObject(obj);
    if (existed) return existed;
    return this.add(new Element<FabricObject>({ obj, type }));
  }

  getElements() {
    return Array.from(this.byId.values());
  }

  getElementsByType(type: string) {
    return this.getElements().filter((e) => e.type === type);
  }

  // ---------------------------
  // canvas events
  // ---------------------------
  private dispatchPointer(name: ScenePointerEventName, el: Element, raw: SceneCanvasEventInfo) {
    const ev: ScenePointerEvent = { name, scene: this, raw, e: raw.e, target: raw.target };
    el._handleSceneEvent(ev);
  }

  private attachCanvasEvents() {
    const c = this.canvas;

    const onObjectAdded = (raw: SceneCanvasEventInfo) => {
      if (!this.opts.autoWrapFromObjectMeta || !raw.target) return;
      this.ensureElementFromObject(raw.target);
    };

    const onMouseDown = (raw: SceneCanvasEventInfo) => {
      const el = this.findClosest(raw.target);
      this.pressed = el;
      if (el) this.dispatchPointer("pointer:down", el, raw);
    };

    const onMouseUp = (raw: SceneCanvasEventInfo) => {
      const el = this.pressed ?? this.findClosest(raw.target);
      this.pressed = null;
      if (el) this.dispatchPointer("pointer:up", el, raw);
    };

    const onObjectRemoved = (raw: SceneCanvasEventInfo) => {
      const el = this.findByObject(raw.target);
      if (el) this.remove(el);
    };

    c.on("object:added", onObjectAdded);
    c.on("mouse:down", onMouseDown);
    c.on("mouse:up", onMouseUp);
    c.on("object:removed", onObjectRemoved);

    this.disposer = () => {
      c.off("object:added", onObjectAdded);
      c.off("mouse:down", onMouseDown);
      c.off("mouse:up", onMouseUp);
      c.off("object:removed", onObjectRemoved);
    };
  }
}
