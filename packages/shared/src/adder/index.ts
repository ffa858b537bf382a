export * from "./rippleCarry.js";
