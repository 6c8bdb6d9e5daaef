import { existsSync } from "node:fs";
import { join } from "node:path";
import type { CommitRecord } from "@commitlens/core";
import { GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import {
  mapParseProgressToHistoryProgress,
  type CommitHistoryQuery,
  type GitHistoryProvider,
  type GitHistoryProgressEvent,
} from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { parseGitLog } from "../parsing/git-log-parser.js";

const EMPTY_HISTORY_CODES = [
  "does not have any commits yet",
  "bad default revision 'head'",
  "ambiguous argument 'head'",
];

const isEmptyHistoryError = (error: unknown): boolean => {
  if (!(error instanceof GitCommandError)) {
    return false;
  }

  const lower = error.message.toLowerCase();
  return EMPTY_HISTORY_CODES.some((code) => lower.includes(code));
};

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  pathExists(repositoryPath: string): boolean {
    return existsSync(repositoryPath);
  }

  isGitRepository(repositoryPath: string): boolean {
    return existsSync(join(repositoryPath, ".git"));
  }

  countCommits(repositoryPath: string): number {
    let output: string;
    try {
      output = this.gitClient.run(repositoryPath, ["rev-list", "--count", "HEAD"]);
    } catch (error) {
      if (isEmptyHistoryError(error)) {
        return 0;
      }

      throw error;
    }

    const count = Number.parseInt(output.trim(), 10);
    if (Number.isNaN(count)) {
      throw new GitCommandError("Failed to parse commit count", ["rev-list", "--count", "HEAD"]);
    }

    return count;
  }

  getCommitHistory(
    repositoryPath: string,
    query: CommitHistoryQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly CommitRecord[] {
    const args = [
      "-c",
      "log.showSignature=false",
      "log",
      "--no-color",
      `--pretty=format:${GIT_LOG_FORMAT}`,
      ...(query.limit === undefined ? [] : [`--max-count=${query.limit}`]),
    ];

    let output: string;
    try {
      output = this.gitClient.run(repositoryPath, args);
    } catch (error) {
      if (isEmptyHistoryError(error)) {
        return [];
      }

      throw error;
    }

    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    return parseGitLog(output, (event) => onProgress?.(mapParseProgressToHistoryProgress(event)));
  }
}
