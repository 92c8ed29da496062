export { ArtifactStore, createRunId, ARTIFACT_FILE, SUMMARY_FILE, TRACE_FILE } from './store.js';
export type { RunHandle, StoredArtifact } from './store.js';
export { renderSummary } from './summary.js';
