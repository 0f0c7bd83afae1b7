import { resolve } from 'path';
import { getEnv } from './env.js';
import type {
  AgreementParameters,
  DatasetMetadataService,
  DepositorService,
} from '../types/agreement.js';
import { ValidationError } from '../types/errors.js';
import { agreementParametersInputSchema } from '../validation/agreementSchemas.js';

export interface AgreementParametersOptions {
  datasetId: string;
  templateResourceDir?: string;
  isSample?: boolean;
  metadataService: DatasetMetadataService;
  identityService: DepositorService;
}

/**
 * Build the settings for one agreement request.
 * Missing template directory and sample flag are taken from the environment.
 * The result is frozen.
 */
export function createAgreementParameters(options: AgreementParametersOptions): AgreementParameters {
  const parsed = agreementParametersInputSchema.safeParse({
    datasetId: options.datasetId,
    templateResourceDir: options.templateResourceDir,
    isSample: options.isSample,
  });
  if (!parsed.success) {
    throw new ValidationError('Invalid agreement parameters', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const env = getEnv();
  return Object.freeze({
    datasetId: parsed.data.datasetId,
    templateResourceDir: parsed.data.templateResourceDir
      ? resolve(parsed.data.templateResourceDir)
      : env.AGREEMENT_TEMPLATE_DIR,
    isSample: parsed.data.isSample ?? env.AGREEMENT_SAMPLE_MODE,
    metadataService: options.metadataService,
    identityService: options.identityService,
  });
}
