export {diffArtifacts} from "./artifact-diff";
export {DeterminismVerifier, shellBuildRunner} from "./determinism-verifier";
export type {BuildIO, BuildRunner} from "./determinism-verifier";
export {normalizeArtifact} from "./normalizer";
