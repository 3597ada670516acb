export {ExclusionFilter} from "./exclusion-filter";
export {MinHeap} from "./min-heap";
export {assessBalance, splitForShard, TestPartitioner} from "./test-partitioner";
export type {PartitionerOptions} from "./test-partitioner";
export {createSnapshot, EMPTY_SNAPSHOT, observedDurations, TimingStore} from "./timing-store";
