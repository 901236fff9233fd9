/**
 * StoredObject Interface
 *
 * One uploaded image in the object store, already shaped for display.
 * The key is both the row label and the deletion target.
 */
export interface StoredObject {
  key: string;
  sizeKb: number;
  lastModified: string;
}

/**
 * UploadListing Interface
 *
 * Response of the listing endpoint. `truncated` is true when the store holds
 * more objects under the prefix than a single listing page returns.
 */
export interface UploadListing {
  prefix: string;
  objects: StoredObject[];
  truncated: boolean;
}
