import type { SceneEvent } from "./events";
import type { Element } from "./element";

/**
 * Behavior：把“能力”从元素本体剥离出来（按压反馈 / hover 样式...）
 * 一个元素可以挂多个 behavior，按挂载顺序收到事件。
 */
export interface Behavior {
  /**
   * 用于调试/查找（可选）
   */
  id?: string;

  /** 元素进入场景（或行为挂到已在场景中的元素上） */
  onAttach?(el: Element): void;
  /** 元素离开场景（或行为被移除） */
  onDetach?(el: Element): void;

  /**
   * Scene 事件（pointer down/up）
   * 返回 true 表示“已消费”，后续 behavior 不再收到。
   */
  onSceneEvent?(el: Element, ev: SceneEvent): boolean | void;
}
