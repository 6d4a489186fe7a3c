export type { FileStats, SandboxedStorage, Timestamp } from "./storage.js";
export { FileSystemSandbox } from "./fs.js";
