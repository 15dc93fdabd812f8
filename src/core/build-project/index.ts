export {
  buildProject,
  addErrorSources,
  formatSummaryLine,
  DEFAULT_STAGES,
  type BuildStages,
  type BuildProjectOptions,
  type BuildProjectSummary,
  type TargetDocumentCount,
} from "./build-project.js";
