export class InvalidArgumentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidArgumentError";
  }
}

export class MissingDependencyError extends InvalidArgumentError {
  constructor(
    readonly packageName: string,
    options?: ErrorOptions
  ) {
    super(`Object storage driver requires "${packageName}"; install it and try again.`, options);
    this.name = "MissingDependencyError";
  }
}

export class FileNotFoundError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "FileNotFoundError";
  }
}

export class DeleteObjectsError extends Error {
  constructor(readonly failedKeys: string[]) {
    super(`Failed to delete ${failedKeys.length} object(s): ${failedKeys.join(", ")}`);
    this.name = "DeleteObjectsError";
  }
}
