import type { CommitRecord } from "@commitlens/core";
import type { ParseGitLogProgressEvent } from "../parsing/git-log-parser.js";

export type GitHistoryProgressEvent =
  | { stage: "git_log_received"; bytes: number }
  | { stage: "git_log_parsed"; commits: number }
  | { stage: "git_log_record_skipped"; reason: string; preview: string };

export type CommitHistoryQuery = {
  limit?: number;
};

export interface GitHistoryProvider {
  pathExists(repositoryPath: string): boolean;
  isGitRepository(repositoryPath: string): boolean;
  countCommits(repositoryPath: string): number;
  getCommitHistory(
    repositoryPath: string,
    query: CommitHistoryQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly CommitRecord[];
}

export const mapParseProgressToHistoryProgress = (
  event: ParseGitLogProgressEvent,
): GitHistoryProgressEvent =>
  event.stage === "record_skipped"
    ? {
        stage: "git_log_record_skipped",
        reason: event.record.reason,
        preview: event.record.preview,
      }
    : { stage: "git_log_parsed", commits: event.parsedRecords };
