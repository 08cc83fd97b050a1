// src/outcome/index.ts
// Diagnostics, failures and outcomes

export * from "./diagnostic";
export * from "./codes";
export * from "./failure";
export * from "./outcome";
export * from "./constructors";
export * from "./matchers";
