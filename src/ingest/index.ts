export { discoverFiles, isAuditable } from "./file-discovery.js";
export { loadTarget } from "./target-loader.js";
export { filterChanged, listChangedFiles } from "./changed-files.js";
export type { AuditTarget, FileDiscoveryOptions, FileEntry } from "./types.js";
