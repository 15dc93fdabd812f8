export {
  FileSystemArtifactWriter,
  InMemoryArtifactWriter,
  ValidatingArtifactWriter,
  type ArtifactWriter,
  type WriteReport,
} from "./artifact-writer.js";
