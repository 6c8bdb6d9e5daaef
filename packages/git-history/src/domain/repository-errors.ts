export class PathNotFoundError extends Error {
  readonly repositoryPath: string;

  constructor(repositoryPath: string) {
    super(`Path '${repositoryPath}' does not exist`);
    this.name = "PathNotFoundError";
    this.repositoryPath = repositoryPath;
  }
}

export class NotARepositoryError extends Error {
  readonly repositoryPath: string;

  constructor(repositoryPath: string) {
    super(`Path '${repositoryPath}' is not a git repository`);
    this.name = "NotARepositoryError";
    this.repositoryPath = repositoryPath;
  }
}

export class InvalidCommitLimitError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Commit limit must be a non-negative integer, received ${limit}`);
    this.name = "InvalidCommitLimitError";
    this.limit = limit;
  }
}
