export * from "./types";
export * from "./utils";

export * from "./bag";
export * from "./events";
export * from "./behavior";
export * from "./element";
export * from "./scene";
export * from "./scenePlugin";

export * from "./fabric/color";
export * from "./fabric/visuals";
export * from "./fabric/scaleTarget";

export * from "./behaviors/pressEffect";
export * from "./recipes/pressEffect";
