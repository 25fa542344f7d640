import type { FabricObject } from "fabric";
import type { Scene } from "./scene";

export type ScenePointerEventName = "pointer:down" | "pointer:up";

/**
 * Fabric 画布事件里我们关心的部分（mouse:down / mouse:up / object:removed 都满足）
 */
export type SceneCanvasEventInfo = {
  target?: FabricObject;
  e?: Event;
};

export type ScenePointerEvent = {
  name: ScenePointerEventName;
  scene: Scene;
  /**
   * 原始 Fabric 事件对象
   */
  raw: SceneCanvasEventInfo;
  /**
   * 原生事件（MouseEvent/PointerEvent/TouchEvent），便于读取 button 等。
   */
  e?: Event;
  /**
   * Fabric 命中对象；pointer:up 可能为空（在别处松开）
   */
  target?: FabricObject;
};

export type SceneEvent = ScenePointerEvent;
