/**
 * A file entry reported by the storage provider.
 */
export interface RemoteFile {
  /** Provider-assigned id, stable across renames and moves (e.g. `id:a4ayc_80_OEAAAAAAAAAXw`) */
  id: string;

  /** File name including extension */
  name: string;

  /** Display path at the time of listing */
  path: string;

  /** Size in bytes */
  size: number;

  /** Client-side modification time as reported by the provider, if any */
  clientModified?: string;
}

/**
 * Result of a full folder listing.
 */
export interface FolderListing {
  files: RemoteFile[];

  /** Provider cursor after the last page, usable for change tracking */
  cursor: string;
}
