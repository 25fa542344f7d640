import type { FabricObject } from "fabric";
import { PressEffect } from "../../press/PressEffect";
import type { PressEffectOptions } from "../../press/options";
import type { PressEffectState } from "../../press/types";
import type { Behavior } from "../behavior";
import type { Element } from "../element";
import type { SceneEvent } from "../events";
import { FabricScaleTarget } from "../fabric/scaleTarget";
import { FabricVisualSource, isAttached } from "../fabric/visuals";

type FabricObjectList = Array<FabricObject | null | undefined>;

export type PressEffectBehaviorOptions = Omit<
  PressEffectOptions,
  "target" | "includeImages" | "includeTexts" | "excludeImages" | "excludeTexts"
> & {
  /**
   * 被缩放的对象；默认是元素自身
   */
  target?: FabricObject | null;
  includeImages?: FabricObjectList;
  includeTexts?: FabricObjectList;
  excludeImages?: FabricObjectList;
  excludeTexts?: FabricObjectList;
  /** 是否消费 pointer 事件（阻止后续 behavior 收到），默认 false */
  consume?: boolean;
};

/**
 * PressEffectBehavior：按下缩小变暗、松开 punch 回弹
 * - onAttach：记录静止缩放、绑定子树里的可着色对象
 * - onDetach：取消动画，强制恢复缩放和颜色
 */
export class PressEffectBehavior implements Behavior {
  id = "press-effect";
  private opts: PressEffectBehaviorOptions;
  private effect: PressEffect | null = null;
  private stateListeners = new Set<(state: PressEffectState) => void>();

  constructor(opts?: PressEffectBehaviorOptions) {
    this.opts = opts ?? {};
  }

  /** 当前挂载中的效果实例（未挂到场景时为 null） */
  getEffect() {
    return this.effect;
  }

  get state(): PressEffectState {
    return this.effect?.state ?? "idle";
  }

  /** 订阅状态变化；effect 重建后依然有效 */
  onStateChange(fn: (state: PressEffectState) => void) {
    this.stateListeners.add(fn);
    return () => {
      this.stateListeners.delete(fn);
    };
  }

  onAttach(el: Element) {
    const scene = el.scene;
    if (!scene) return;

    const o = this.opts;
    const source = new FabricVisualSource(el.obj);
    const toVisuals = (list?: FabricObjectList) => list?.map((obj) => source.visualFor(obj));
    // 显式指定的 target 离开场景后，指针事件变成空操作
    const targetObj = o.target ?? el.obj;
    const target = new FabricScaleTarget(targetObj, () => isAttached(targetObj, el.obj));

    const effect = new PressEffect({
      scaleAmount: o.scaleAmount,
      duration: o.duration,
      punchStrength: o.punchStrength,
      punchDuration: o.punchDuration,
      pressedColorMultiplier: o.pressedColorMultiplier,
      target,
      source,
      includeImages: toVisuals(o.includeImages),
      includeTexts: toVisuals(o.includeTexts),
      excludeImages: toVisuals(o.excludeImages),
      excludeTexts: toVisuals(o.excludeTexts),
      onSessionStart: (fx) => scene.loop.add(fx),
    });
    effect.events.on("state:change", (state) => {
      this.stateListeners.forEach((fn) => fn(state));
    });

    this.effect = effect;
  }

  onDetach(el: Element) {
    const effect = this.effect;
    if (!effect) return;
    effect.deactivate();
    el.scene?.loop.remove(effect);
    el.scene?.canvas.requestRenderAll();
    effect.events.clear();
    this.effect = null;
  }

  onSceneEvent(_el: Element, ev: SceneEvent) {
    const effect = this.effect;
    if (!effect) return false;
    if (ev.name === "pointer:down") effect.pointerDown();
    else if (ev.name === "pointer:up") effect.pointerUp();
    return this.opts.consume === true;
  }

  /**
   * 重新扫描子树并重建原始颜色缓存（子树结构变化后手动调用）
   */
  rebind() {
    this.effect?.rebind();
  }

  /** 外部控制：暂停/恢复响应（暂停时立即复原） */
  setActive(active: boolean) {
    const effect = this.effect;
    if (!effect) return;
    if (active) effect.activate();
    else effect.deactivate();
  }
}
