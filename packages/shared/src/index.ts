export * from "./validation";
export * from "./registry-model";
