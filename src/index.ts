import "reflect-metadata";

export * from "./errors";
export * from "./shared-types";
export {createStreamChannel, MemoryOutputChannel, OutputChannelService} from "./output-channel.service";
export type {ErrorAwareChannel, LogLevel, OutputChannel} from "./output-channel.service";
export {runPipeline} from "./core-engine/main";
export type {RunOptions, RunSummary} from "./core-engine/main";
export * from "./core-engine/actions";
export * from "./core-engine/config";
export * from "./core-engine/dependency-graph";
export * from "./core-engine/determinism";
export * from "./core-engine/ipc";
export * from "./core-engine/pipeline";
export * from "./core-engine/reporting";
export * from "./core-engine/scheduler";
export * from "./core-engine/sharding";
export * from "./test-adapters";
