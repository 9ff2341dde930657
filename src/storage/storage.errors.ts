/**
 * Base class for failures talking to the storage provider.
 */
export class StorageError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

/** Credentials are missing, expired, or were rejected. */
export class StorageAuthError extends StorageError {}

/** The watch folder could not be listed. */
export class StorageListingError extends StorageError {}

/** A file could not be downloaded to the staging area. */
export class StorageDownloadError extends StorageError {}
