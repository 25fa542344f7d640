import { useEffect, useRef, useState } from "react";
import { Scene, type SceneCanvas, type SceneOptions } from "../core/scene";

/**
 * Scene Hook
 * 只负责创建和销毁 scene，canvas 变化时重建；options 在创建时读取
 */
export function useScene(canvas: SceneCanvas | null, options?: SceneOptions): Scene | null {
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const [scene, setScene] = useState<Scene | null>(null);

  useEffect(() => {
    if (!canvas) return;

    const instance = new Scene(canvas, optionsRef.current);
    setScene(instance);

    return () => {
      instance.dispose();
      setScene(null);
    };
  }, [canvas]);

  return scene;
}
