export { useScene } from "./useScene";
export { usePressEffect, type UsePressEffectOptions, type UsePressEffectReturn } from "./usePressEffect";
