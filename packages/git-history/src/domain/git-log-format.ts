export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

// hash, author name, author email, subject, body
export const GIT_LOG_FORMAT = `%x1e%H%x1f%an%x1f%ae%x1f%s%x1f%b`;

export const GIT_LOG_FIELD_COUNT = 5;
