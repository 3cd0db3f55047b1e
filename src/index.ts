// Main exports for programmatic usage

export { prependCommand } from "./commands/prepend";
export { releaseCommand } from "./commands/release";
export * from "./lib/changelog";
export * from "./lib/config";
export * from "./lib/errors";
export * from "./lib/publisher";
export * from "./types/release";
export * from "./utils/git";
