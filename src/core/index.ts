export type {
  FileSystem,
  ShellExecutor,
  TagSource,
  TagSink,
  CreateTagOptions,
  BranchReader,
  Repository,
  Prompter,
} from "./interfaces";
export { createNodeFileSystem, createNodeShell } from "./node";
