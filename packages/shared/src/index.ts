export * from "./schemas/bot-state";
export * from "./schemas/control";
export * from "./schemas/runtime-config";
export * from "./schemas/trading";
