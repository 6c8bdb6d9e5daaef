export type CommitRecord = {
  readonly hash: string;
  readonly authorName: string;
  readonly authorEmail: string;
  readonly subject: string;
  readonly body?: string;
};

const COMMIT_HASH_PATTERN = /^[0-9a-f]{40}$/;

export const isCommitHash = (value: string): boolean => COMMIT_HASH_PATTERN.test(value);

export const shortHash = (hash: string): string => hash.slice(0, 7);
