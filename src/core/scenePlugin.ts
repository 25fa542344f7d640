import type { FabricPlugin, FabricPluginContext } from "./types";
import { Bag } from "./bag";
import { Scene, type SceneCanvas, type SceneOptions } from "./scene";

const sceneBag = new Bag<Scene>("scene");

export function getSceneFromCanvas(canvas: SceneCanvas | null | undefined): Scene | null {
  if (!canvas) return null;
  return sceneBag.get(canvas) ?? null;
}

/**
 * 把 Scene 作为一个“基础插件”挂进 plugins 体系里。
 * 其他插件可以通过 getSceneFromCanvas(ctx.canvas) 拿到 Scene。
 */
export function createScenePlugin(opts?: SceneOptions): FabricPlugin {
  return {
    id: "press-scene",
    init: (ctx: FabricPluginContext) => {
      const existed = getSceneFromCanvas(ctx.canvas);
      if (existed) {
        console.warn("[Scene] canvas already has a scene, reusing it");
        return;
      }
      const scene = new Scene(ctx.canvas, opts);
      sceneBag.set(ctx.canvas, scene);
      return () => {
        scene.dispose();
        sceneBag.set(ctx.canvas, undefined);
      };
    },
  };
}
