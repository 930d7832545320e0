export * from "./card";
export * from "./line";
export * from "./protocol";
export * from "./verdict";
