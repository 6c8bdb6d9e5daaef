import type { CommitRecord } from "@commitlens/core";
import {
  InvalidCommitLimitError,
  NotARepositoryError,
  PathNotFoundError,
} from "../domain/repository-errors.js";
import type { GitHistoryProvider, GitHistoryProgressEvent } from "./git-history-provider.js";

export type FetchCommitHistoryInput = {
  repositoryPath: string;
  limit?: number;
};

export type FetchCommitsProgressEvent =
  | { stage: "checking_repository" }
  | { stage: "loading_commit_history"; limit: number | null }
  | { stage: "history"; event: GitHistoryProgressEvent }
  | { stage: "commits_loaded"; commits: number };

export const assertCommitLimit = (limit: number | undefined): void => {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
    throw new InvalidCommitLimitError(limit);
  }
};

export const assertRepository = (repositoryPath: string, historyProvider: GitHistoryProvider): void => {
  if (!historyProvider.pathExists(repositoryPath)) {
    throw new PathNotFoundError(repositoryPath);
  }

  if (!historyProvider.isGitRepository(repositoryPath)) {
    throw new NotARepositoryError(repositoryPath);
  }
};

export const fetchCommitHistory = (
  input: FetchCommitHistoryInput,
  historyProvider: GitHistoryProvider,
  onProgress?: (event: FetchCommitsProgressEvent) => void,
): readonly CommitRecord[] => {
  assertCommitLimit(input.limit);

  onProgress?.({ stage: "checking_repository" });
  assertRepository(input.repositoryPath, historyProvider);

  if (input.limit === 0) {
    onProgress?.({ stage: "commits_loaded", commits: 0 });
    return [];
  }

  onProgress?.({ stage: "loading_commit_history", limit: input.limit ?? null });
  const commits = historyProvider.getCommitHistory(
    input.repositoryPath,
    input.limit === undefined ? {} : { limit: input.limit },
    (event) => onProgress?.({ stage: "history", event }),
  );
  onProgress?.({ stage: "commits_loaded", commits: commits.length });
  return commits;
};
