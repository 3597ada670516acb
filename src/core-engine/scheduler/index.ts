export {JobContext, ENV_FILE_VARIABLE} from "./job-context";
export type {JobContextOptions} from "./job-context";
export {JobRunner} from "./job-runner";
export type {JobRunnerOptions} from "./job-runner";
export {JobScheduler, pipelineExitCode} from "./job-scheduler";
export type {SchedulerHooks, SchedulerOptions} from "./job-scheduler";
export {WorkerPool} from "./worker-pool";
