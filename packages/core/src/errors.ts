export class NotTrackedError extends Error {
  readonly path: string;

  constructor(path: string, message = `path is not tracked by version control: ${path}`) {
    super(message);
    this.name = "NotTrackedError";
    this.path = path;
  }
}

export class BlameUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = "BlameUnavailableError";
    this.path = path;
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export class InvalidPathError extends Error {
  readonly path: string;

  constructor(path: string, message = `path is neither a file nor a directory: ${path}`) {
    super(message);
    this.name = "InvalidPathError";
    this.path = path;
  }
}
