import type { SceneCanvas } from "./scene";

export type PluginDisposer = () => void;

export interface FabricPluginContext {
  /** fabric Canvas（或任何满足 SceneCanvas 的事件源） */
  canvas: SceneCanvas;
}

export interface FabricPlugin {
  id: string;
  init: (ctx: FabricPluginContext) => PluginDisposer | void;
}
