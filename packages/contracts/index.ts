export * from "./core/arrays";
export * from "./core/coordinates";

export * from "./errors/errors";

export * from "./config/options";
