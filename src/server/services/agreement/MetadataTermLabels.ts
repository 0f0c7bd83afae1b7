/**
 * Metadata Term Labels
 *
 * Loads the ordered list of metadata terms shown in the agreement's
 * metadata table, together with the label printed for each term.
 */

import { readFileSync } from 'fs';
import { ResourceReadError, ResourceValidationError } from '../../types/errors.js';
import {
  metadataTermsResourceSchema,
  type MetadataTermLabel,
} from '../../validation/agreementSchemas.js';

export class MetadataTermLabels {
  private readonly labels: MetadataTermLabel[];

  constructor(labels: MetadataTermLabel[]) {
    this.labels = labels;
  }

  /**
   * Read and validate a JSON term label resource
   *
   * @throws ResourceReadError if the file cannot be read
   * @throws ResourceValidationError if the content is not a valid resource
   */
  static load(path: string): MetadataTermLabels {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf8');
    } catch (error) {
      throw new ResourceReadError(path, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ResourceValidationError(path, [error instanceof Error ? error.message : String(error)]);
    }

    const parsed = metadataTermsResourceSchema.safeParse(json);
    if (!parsed.success) {
      throw new ResourceValidationError(
        path,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    return new MetadataTermLabels(parsed.data.terms);
  }

  get terms(): MetadataTermLabel[] {
    return [...this.labels];
  }
}
