/**
 * A document on local disk, ready for extraction.
 */
export interface ResolvedDocument {
  path: string;
  /** Releases the file once the workflow is done with it */
  release(): Promise<void>;
}

/**
 * Produces the local file an extraction task works on: an upload already
 * on disk, or a remote document fetched first.
 */
export interface DocumentSource {
  /** Human readable origin, used in log lines */
  readonly description: string;
  resolve(): Promise<ResolvedDocument>;
}
