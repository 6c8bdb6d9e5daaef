import { isCommitHash, type CommitRecord } from "@commitlens/core";
import {
  COMMIT_FIELD_SEPARATOR,
  COMMIT_RECORD_SEPARATOR,
  GIT_LOG_FIELD_COUNT,
} from "../domain/git-log-format.js";

export type SkippedGitLogRecord = {
  reason: "missing_fields" | "invalid_hash";
  preview: string;
};

export type ParseGitLogProgressEvent =
  | { stage: "record_skipped"; record: SkippedGitLogRecord }
  | { stage: "records_parsed"; parsedRecords: number; totalRecords: number };

const previewRecord = (record: string): string => {
  const firstLine = record.split("\n")[0] ?? "";
  return firstLine.replaceAll(COMMIT_FIELD_SEPARATOR, "|").slice(0, 80);
};

const parseRecord = (record: string): CommitRecord | SkippedGitLogRecord => {
  const fields = record.split(COMMIT_FIELD_SEPARATOR);
  if (fields.length < GIT_LOG_FIELD_COUNT - 1) {
    return { reason: "missing_fields", preview: previewRecord(record) };
  }

  const [hashRaw, authorName, authorEmail, subject] = fields;
  if (hashRaw === undefined || authorName === undefined || authorEmail === undefined || subject === undefined) {
    return { reason: "missing_fields", preview: previewRecord(record) };
  }

  const hash = hashRaw.trim();
  if (!isCommitHash(hash)) {
    return { reason: "invalid_hash", preview: previewRecord(record) };
  }

  // A body may itself contain the field separator; everything after the subject belongs to it.
  const body = fields.slice(GIT_LOG_FIELD_COUNT - 1).join(COMMIT_FIELD_SEPARATOR).trim();

  return {
    hash,
    authorName,
    authorEmail,
    subject: subject.trimEnd(),
    ...(body.length === 0 ? {} : { body }),
  };
};

const isSkipped = (result: CommitRecord | SkippedGitLogRecord): result is SkippedGitLogRecord =>
  "reason" in result;

/**
 * Parses `git log` output produced with `GIT_LOG_FORMAT`, preserving git's
 * most-recent-first order. Malformed records are skipped and reported through `onProgress`.
 */
export const parseGitLog = (
  rawLog: string,
  onProgress?: (event: ParseGitLogProgressEvent) => void,
): readonly CommitRecord[] => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .map((record) => record.replace(/\n+$/, ""))
    .filter((record) => record.trim().length > 0);

  const commits: CommitRecord[] = [];
  for (const record of records) {
    const parsed = parseRecord(record);
    if (isSkipped(parsed)) {
      onProgress?.({ stage: "record_skipped", record: parsed });
      continue;
    }

    commits.push(parsed);
  }

  onProgress?.({ stage: "records_parsed", parsedRecords: commits.length, totalRecords: records.length });
  return commits;
};
