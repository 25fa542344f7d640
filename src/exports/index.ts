/**
 * 库导出入口
 *
 * 使用方式：
 * const scene = new Scene(canvas);
 * const el = scene.wrapAndAdd(buttonGroup, "button");
 * bindPressEffect(el, { scaleAmount: 0.92 });
 */

// 与宿主无关的动画内核
export * from "../press";

// fabric 宿主
export * from "../core";

// React
export * from "../hooks";
