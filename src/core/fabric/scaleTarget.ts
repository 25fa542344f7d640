import type { FabricObject } from "fabric";
import type { ScaleTarget, Vec3 } from "../../press/types";

/**
 * scaleX / scaleY 作为缩放目标；缩放时保持对象中心不动。
 * fabric 没有 z 轴，这里只记住写入的值。
 */
export class FabricScaleTarget implements ScaleTarget {
  private z = 1;

  constructor(
    readonly obj: FabricObject,
    private readonly alive: () => boolean = () => true,
  ) {}

  getScale(): Vec3 {
    return { x: this.obj.scaleX, y: this.obj.scaleY, z: this.z };
  }

  setScale(scale: Vec3) {
    const center = this.obj.getRelativeCenterPoint();
    this.obj.set({ scaleX: scale.x, scaleY: scale.y });
    this.obj.setPositionByOrigin(center, "center", "center");
    this.obj.setCoords();
    this.z = scale.z;
  }

  isAlive() {
    return this.alive();
  }
}
