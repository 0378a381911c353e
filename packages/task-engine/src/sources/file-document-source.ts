import type { DocumentSource, ResolvedDocument } from './document-source';

import { rm } from 'node:fs/promises';

/**
 * An uploaded file. The workflow owns it and deletes it on release.
 */
export class FileDocumentSource implements DocumentSource {
  readonly description: string;

  constructor(
    private readonly path: string,
    originalName?: string,
  ) {
    this.description = originalName ?? path;
  }

  async resolve(): Promise<ResolvedDocument> {
    return {
      path: this.path,
      release: () => rm(this.path, { force: true }),
    };
  }
}
