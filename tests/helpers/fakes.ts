import type { ColorVisual, Rgba, ScaleTarget, Vec3, VisualKind, VisualSource } from "../../src/press/types";
import type { FrameScheduler } from "../../src/press/FrameLoop";
import type { SceneCanvas, SceneCanvasEventName } from "../../src/core/scene";
import type { SceneCanvasEventInfo } from "../../src/core/events";

export class FakeTransform implements ScaleTarget {
  alive = true;
  writes = 0;

  constructor(public scale: Vec3 = { x: 1, y: 1, z: 1 }) {}

  getScale() {
    return { ...this.scale };
  }

  setScale(scale: Vec3) {
    this.scale = { ...scale };
    this.writes++;
  }

  isAlive() {
    return this.alive;
  }
}

export class FakeVisual implements ColorVisual {
  alive = true;
  writes = 0;

  constructor(
    readonly name: string,
    public color: Rgba,
  ) {}

  getColor() {
    return { ...this.color };
  }

  setColor(color: Rgba) {
    this.color = { ...color };
    this.writes++;
  }

  isAlive() {
    return this.alive;
  }
}

/** 子树：直接列出两类元素，可以包含重复和空值 */
export class FakeTree implements VisualSource {
  constructor(
    public images: Array<FakeVisual | null> = [],
    public texts: Array<FakeVisual | null> = [],
  ) {}

  collect(kind: VisualKind) {
    return kind === "image" ? [...this.images] : [...this.texts];
  }
}

export function rgba(r: number, g: number, b: number, a = 1): Rgba {
  return { r, g, b, a };
}

/** 手动推进的帧调度 */
export class ManualScheduler implements FrameScheduler {
  time = 0;
  private nextId = 1;
  private queue = new Map<number, (time: number) => void>();

  requestFrame = (cb: (time: number) => void) => {
    const id = this.nextId++;
    this.queue.set(id, cb);
    return id;
  };

  cancelFrame = (id: number) => {
    this.queue.delete(id);
  };

  now = () => this.time;

  get pending() {
    return this.queue.size;
  }

  /** 推进一帧 */
  advance(ms = 16) {
    this.time += ms;
    const callbacks = [...this.queue.values()];
    this.queue.clear();
    callbacks.forEach((cb) => cb(this.time));
  }

  advanceFrames(count: number, ms = 16) {
    for (let i = 0; i < count; i++) this.advance(ms);
  }
}

type Handler = (raw: SceneCanvasEventInfo) => void;

/** 代替 fabric Canvas 的事件源 */
export class FakeCanvas implements SceneCanvas {
  renders = 0;
  private handlers = new Map<SceneCanvasEventName, Set<Handler>>();

  on(eventName: SceneCanvasEventName, handler: Handler) {
    const set = this.handlers.get(eventName) ?? new Set<Handler>();
    set.add(handler);
    this.handlers.set(eventName, set);
  }

  off(eventName: SceneCanvasEventName, handler: Handler) {
    this.handlers.get(eventName)?.delete(handler);
  }

  requestRenderAll() {
    this.renders++;
  }

  fire(eventName: SceneCanvasEventName, raw: SceneCanvasEventInfo = {}) {
    this.handlers.get(eventName)?.forEach((h) => h(raw));
  }

  listenerCount() {
    let n = 0;
    this.handlers.forEach((set) => (n += set.size));
    return n;
  }
}
