import type { CommitRecord } from "@commitlens/core";
import {
  fetchCommitHistory,
  type FetchCommitsProgressEvent,
} from "./application/fetch-commit-history.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";

export {
  assertRepository,
  fetchCommitHistory,
  type FetchCommitHistoryInput,
  type FetchCommitsProgressEvent,
} from "./application/fetch-commit-history.js";
export type {
  CommitHistoryQuery,
  GitHistoryProgressEvent,
  GitHistoryProvider,
} from "./application/git-history-provider.js";
export {
  InvalidCommitLimitError,
  NotARepositoryError,
  PathNotFoundError,
} from "./domain/repository-errors.js";
export { GitCommandError, type GitCommandClient } from "./infrastructure/git-command-client.js";
export { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";
export { parseGitLog } from "./parsing/git-log-parser.js";

export const createGitHistoryProvider = (): GitCliHistoryProvider =>
  new GitCliHistoryProvider(new ExecGitCommandClient());

export const fetchCommits = (
  path = ".",
  limit?: number,
  onProgress?: (event: FetchCommitsProgressEvent) => void,
): readonly CommitRecord[] =>
  fetchCommitHistory(
    limit === undefined ? { repositoryPath: path } : { repositoryPath: path, limit },
    createGitHistoryProvider(),
    onProgress,
  );
