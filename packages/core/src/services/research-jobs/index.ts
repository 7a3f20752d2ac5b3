export { ResearchJobRegistry, groupIndexId, type ResearchJobRegistryDeps } from "./job-registry";
export { reduceJobStatus, toProgressSnapshot, NOT_STARTED, type JobEvent } from "./job-status";
export {
  FileTaskGroupStore,
  CONTEXT_ID_PATTERN,
  type TaskGroupStore,
  type FileTaskGroupStoreOptions,
} from "./task-group-store";
