export { AgreementPlaceholderService } from './services/agreement/AgreementPlaceholderService.js';
export {
  PlaceholderMapper,
  FOOTER_TEXT_FILE,
  CHECKSUM_NOT_CALCULATED,
} from './services/agreement/PlaceholderMapper.js';
export { MetadataTermLabels } from './services/agreement/MetadataTermLabels.js';
export { Placeholder, mergePlaceholders, type PlaceholderName } from './services/agreement/placeholders.js';
export { createAgreementParameters, type AgreementParametersOptions } from './config/agreementParameters.js';
export { getEnv, resetEnv, type Env } from './config/env.js';
export * from './types/agreement.js';
export * from './types/errors.js';
export { IsoDate, formatCalendarDate, formatDateTime } from './utils/dateUtils.js';
export { logger, createChildLogger, withRequestContext } from './utils/logger.js';
