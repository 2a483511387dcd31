export * from "./core/changelog";
export * from "./core/config";
export * from "./core/git";
export * from "./core/github";
export * from "./core/logger";
export * from "./core/release-sync";
export * from "./core/run";
export * from "./core/selection";
export * from "./types/errors";
