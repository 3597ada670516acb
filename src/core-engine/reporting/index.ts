export {deriveStatus, OutputStream, ReportBuilder, ResultAggregator} from "./result-aggregator";
export type {ReportHooks} from "./result-aggregator";
export {escapeXml, renderJUnit, reportFileStem, ReportWriter} from "./report-writer";
