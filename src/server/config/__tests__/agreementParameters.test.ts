import { resolve } from 'path';
import { createAgreementParameters } from '../agreementParameters.js';
import { getEnv, resetEnv } from '../env.js';
import { ValidationError } from '../../types/errors.js';
import type { DatasetMetadataService, DepositorService } from '../../types/agreement.js';

describe('createAgreementParameters', () => {
  const metadataService: DatasetMetadataService = {
    getMetadata: () => Promise.reject(new Error('not used')),
    getFiles: () => Promise.resolve([]),
  };
  const identityService: DepositorService = {
    getDepositor: () => Promise.reject(new Error('not used')),
  };

  beforeEach(() => {
    delete process.env.AGREEMENT_SAMPLE_MODE;
    delete process.env.AGREEMENT_TEMPLATE_DIR;
    resetEnv();
  });

  it('fills missing settings from the environment', () => {
    const parameters = createAgreementParameters({ datasetId: 'dataset:42', metadataService, identityService });

    expect(parameters).toEqual({
      datasetId: 'dataset:42',
      templateResourceDir: getEnv().AGREEMENT_TEMPLATE_DIR,
      isSample: false,
      metadataService,
      identityService,
    });
  });

  it('keeps explicit settings', () => {
    const parameters = createAgreementParameters({
      datasetId: 'dataset:42',
      templateResourceDir: 'custom/templates',
      isSample: true,
      metadataService,
      identityService,
    });

    expect(parameters.templateResourceDir).toBe(resolve('custom/templates'));
    expect(parameters.isSample).toBe(true);
  });

  it('returns frozen parameters', () => {
    const parameters = createAgreementParameters({ datasetId: 'dataset:42', metadataService, identityService });

    expect(Object.isFrozen(parameters)).toBe(true);
  });

  it('requires a dataset ID', () => {
    expect(() => createAgreementParameters({ datasetId: '', metadataService, identityService })).toThrow(
      ValidationError
    );
  });
});
