export { GitMetadataClassifier } from "./gitMetadataClassifier";
