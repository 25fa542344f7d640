import { useEffect, useRef, useState } from "react";
import type { FabricObject } from "fabric";
import type { Scene } from "../core/scene";
import type { PressEffectBehavior, PressEffectBehaviorOptions } from "../core/behaviors/pressEffect";
import { bindPressEffect } from "../core/recipes/pressEffect";
import type { PressEffectState } from "../press/types";

export interface UsePressEffectOptions extends PressEffectBehaviorOptions {
  /** 对象还没有注册到 scene 时，用这个 type 包装成 Element，默认 "button" */
  type?: string;
}

export interface UsePressEffectReturn {
  behavior: PressEffectBehavior | null;
  state: PressEffectState;
}

/**
 * 按压反馈 Hook
 * 组件挂载期间给 obj 挂上 PressEffectBehavior，卸载时复原缩放和颜色。
 * 配置只在挂载（或 scene / obj 变化）时读取。
 */
export function usePressEffect(
  scene: Scene | null,
  obj: FabricObject | null,
  options?: UsePressEffectOptions,
): UsePressEffectReturn {
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const [behavior, setBehavior] = useState<PressEffectBehavior | null>(null);
  const [state, setState] = useState<PressEffectState>("idle");

  useEffect(() => {
    if (!scene || !obj) return;

    const { type = "button", ...behaviorOptions } = optionsRef.current ?? {};
    const existed = scene.findByObject(obj);
    const el = existed ?? scene.wrapAndAdd(obj, type);

    const instance = bindPressEffect(el, behaviorOptions);
    const off = instance.onStateChange(setState);
    setBehavior(instance);
    setState(instance.state);

    return () => {
      off();
      el.removeBehavior((b) => b === instance);
      if (!existed) scene.remove(el);
      setBehavior(null);
      setState("idle");
    };
  }, [scene, obj]);

  return { behavior, state };
}
