export * from "./core/types";
export * from "./core/fixed-point";
export * from "./core/walls";
export * from "./core/map-format";
export * from "./core/world";
export * from "./core/arrow-stock";
export * from "./core/config";
export * from "./core/input";
export * from "./core/state-machine";
export * from "./core/sim";
export * from "./core/snapshot";
export * from "./entities/walker";
export * from "./maps/puzzle";
export * from "./maps/catalog";
export * from "./ui/keyboard";
