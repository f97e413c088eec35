export * from "./core/time";
export * from "./core/provenance";

// Sample batches (acquisition output)
export * from "./signal/signal";

// Bus topics, payload schemas, transport contracts
export * from "./bus/topics";
export * from "./bus/schemas";
export * from "./bus/interfaces";

export * from "./session/session";

export * from "./detection/detection";

export * from "./config/runtime";

export * from "./diagnostics/diagnostics";
export * from "./diagnostics/logger";

export * from "./pipeline/interfaces";
