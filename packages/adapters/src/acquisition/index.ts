export {
  SyntheticSampleSource,
  type SyntheticSourceConfig,
  type SyntheticArtifact,
  type SyntheticArtifactKind,
} from "./SyntheticSampleSource";
export { AcquisitionRelay, type AcquisitionRelayConfig } from "./AcquisitionRelay";
export { createRandom } from "./random";
