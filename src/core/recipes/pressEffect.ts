import type { Element } from "../element";
import type { Scene } from "../scene";
import { PressEffectBehavior, type PressEffectBehaviorOptions } from "../behaviors/pressEffect";

/**
 * 一行代码给元素挂上按压反馈；已有 PressEffectBehavior 时先卸掉旧的（配置以新的为准）
 */
export function bindPressEffect(el: Element, opts?: PressEffectBehaviorOptions) {
  el.removeBehavior((b) => b instanceof PressEffectBehavior);
  const behavior = new PressEffectBehavior(opts);
  el.addBehavior(behavior);
  return behavior;
}

/**
 * 给某个 type 的所有元素（包括以后新增的）挂上按压反馈。
 * 已经挂过的元素保持原样，不会被新配置覆盖。返回取消订阅函数
 */
export function bindPressEffectOnType(scene: Scene, type: string, opts?: PressEffectBehaviorOptions) {
  const bindMissing = (el: Element) => {
    if (el.type !== type || el.findBehavior(PressEffectBehavior)) return;
    bindPressEffect(el, opts);
  };
  scene.getElementsByType(type).forEach(bindMissing);
  return scene.on("element:added", ({ element }) => bindMissing(element));
}

/**
 * “Rebind Targets Now”：对场景里所有按压反馈重新扫描子树并重建颜色缓存
 */
export function rebindPressEffects(scene: Scene) {
  let count = 0;
  scene.getElements().forEach((el) => {
    el.getBehaviors().forEach((b) => {
      if (!(b instanceof PressEffectBehavior)) return;
      b.rebind();
      count++;
    });
  });
  return count;
}
