// Shape validation
export * from "./shape";

// Angle conversions
export * from "./angles";

// Coordinate transforms
export * from "./coordinates";

// Angular metrics
export * from "./metrics";

// Signal levels
export * from "./signal";

// Array composition
export * from "./arrays";

// Diagnostics
export * from "./diagnostics";
