import { join } from 'path';
import type { AgreementParameters, PlaceholderMap } from '../../types/agreement.js';
import { getEnv } from '../../config/env.js';
import { createChildLogger } from '../../utils/logger.js';
import { PlaceholderMapper } from './PlaceholderMapper.js';
import { mergePlaceholders } from './placeholders.js';

/**
 * Service for building the complete placeholder context of a deposit agreement.
 * Fetches the dataset and depositor from the collaborators in the parameters
 * and combines every partial map of the PlaceholderMapper.
 */
export class AgreementPlaceholderService {
  constructor(private readonly termsFile: string = getEnv().AGREEMENT_TERMS_FILE) {}

  async createPlaceholders(parameters: AgreementParameters, now: Date = new Date()): Promise<PlaceholderMap> {
    const log = createChildLogger({
      component: 'AgreementPlaceholderService',
      datasetId: parameters.datasetId,
      isSample: parameters.isSample,
    });

    const mapper = new PlaceholderMapper(join(parameters.templateResourceDir, this.termsFile), parameters);

    const [metadata, files, depositor] = await Promise.all([
      parameters.metadataService.getMetadata(parameters.datasetId),
      parameters.metadataService.getFiles(parameters.datasetId),
      parameters.identityService.getDepositor(parameters.datasetId),
    ]);

    const placeholders = mergePlaceholders(
      parameters.isSample ? mapper.sampleHeader(metadata) : mapper.header(metadata),
      mapper.embargo(metadata),
      mapper.depositor(depositor),
      mapper.accessRights(metadata),
      mapper.metadataTable(metadata),
      mapper.fileTable(files),
      mapper.footer(),
      mapper.generated(now)
    );

    log.info({ placeholderCount: Object.keys(placeholders).length }, 'Created agreement placeholders');
    return placeholders;
  }
}
