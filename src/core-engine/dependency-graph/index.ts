export {JobGraph} from "./job-graph";
export type {JobNode} from "./job-graph";
