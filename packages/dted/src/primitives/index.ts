export * from "./angle.js";
export * from "./axis-element.js";
