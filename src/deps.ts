export * as TOML from "smol-toml";
export { default as Docker } from "dockerode";

export { log, setupLogs, type LevelName } from "./lib/logging.ts";
