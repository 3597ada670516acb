export {DEFAULT_PLACEHOLDER, parseDuration, PipelineBuilder} from "./pipeline-builder";
export type {PipelinePlan, Selection} from "./pipeline-builder";
