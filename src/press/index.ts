export * from "./types";
export * from "./math";
export * from "./options";
export * from "./EventBus";
export * from "./binder";
export * from "./colorCache";
export * from "./animations";
export * from "./PressEffect";
export * from "./FrameLoop";
