export type {Action, StepIO} from "./action.interface";
export {parseEnvFile} from "./env-file";
export {DEFAULT_SHELL, parseShell, runShell} from "./shell";
export type {ShellOptions} from "./shell";
export {ShellAction} from "./shell-action";
export type {ShellActionOptions} from "./shell-action";
export {renderShardCommand, shellQuote, TestShardsAction} from "./test-shards-action";
export type {TestList, TestShardsOptions} from "./test-shards-action";
export {VerifyDeterminismAction} from "./verify-determinism-action";
