import { AgreementPlaceholderService } from '../AgreementPlaceholderService.js';
import { AccessCategory, FileAccessRight, type DatasetFile } from '../../../types/agreement.js';
import { IsoDate } from '../../../utils/dateUtils.js';
import {
  createMetadataStub,
  stubDepositorService,
  stubMetadataService,
  testDepositor,
  testParameters,
} from './stubs.js';

describe('AgreementPlaceholderService', () => {
  const service = new AgreementPlaceholderService('MetadataTestTerms.json');
  const now = new Date(2021, 5, 7, 8, 9, 10);

  const metadata = createMetadataStub({
    doi: '10.1234/survey-2020',
    title: 'Survey 2020',
    submitted: [new IsoDate('2020-01-15')],
    available: [new IsoDate('2019-12-01')],
    accessCategory: AccessCategory.OPEN_ACCESS,
    terms: {
      'dc:title': ['Survey 2020'],
      'dcterms:accessRights': ['OPEN_ACCESS'],
    },
  });

  const files: DatasetFile[] = [
    {
      path: 'data/survey.csv',
      checksum: 'f1d2d2f924e986ac86fdf7b36c94bcdf32beec15',
      accessibleTo: FileAccessRight.ANONYMOUS,
      visibleTo: FileAccessRight.ANONYMOUS,
    },
  ];

  it('creates the complete placeholder context of an agreement', async () => {
    const parameters = testParameters({
      metadataService: stubMetadataService(metadata, files),
      identityService: stubDepositorService(testDepositor),
    });

    await expect(service.createPlaceholders(parameters, now)).resolves.toEqual({
      IsSample: false,
      DansManagedDoi: '10.1234/survey-2020',
      DansManagedEncodedDoi: '10.1234%2Fsurvey-2020',
      DateSubmitted: '2020-01-15',
      Title: 'Survey 2020',
      UnderEmbargo: false,
      DateAvailable: '2019-12-01',
      DepositorName: 'name',
      DepositorOrganisation: 'org',
      DepositorAddress: 'addr',
      DepositorPostalCode: 'postal',
      DepositorCity: 'city',
      DepositorCountry: 'country',
      DepositorTelephone: 'tel',
      DepositorEmail: 'mail',
      OpenAccess: true,
      DatasetAccessRights: 'Open Access',
      MetadataTable: [
        { MetadataKey: 'Title', MetadataValue: 'Survey 2020' },
        { MetadataKey: 'Access rights', MetadataValue: 'Open Access' },
      ],
      HasFiles: true,
      FileTable: [
        {
          FilePath: 'data/survey.csv',
          FileChecksum: 'f1d2d2f924e986ac86fdf7b36c94bcdf32beec15',
          FileAccessibleTo: 'Anonymous',
          FileVisibleTo: 'Anonymous',
        },
      ],
      FooterText: 'Test footer\nsecond line',
      CurrentDateAndTime: '2021-06-07 08:09:10',
    });
  });

  it('leaves the DOI out of a sample agreement without reading it', async () => {
    const getManagedDoi = jest.fn(() => '10.1234/survey-2020');
    const parameters = testParameters({
      isSample: true,
      metadataService: stubMetadataService({ ...metadata, getManagedDoi }, files),
      identityService: stubDepositorService(testDepositor),
    });

    const placeholders = await service.createPlaceholders(parameters, now);

    expect(getManagedDoi).not.toHaveBeenCalled();
    expect(placeholders.IsSample).toBe(true);
    expect(placeholders).not.toHaveProperty('DansManagedDoi');
    expect(placeholders).not.toHaveProperty('DansManagedEncodedDoi');
  });

  it('passes a collaborator failure on to the caller', async () => {
    const parameters = testParameters({
      metadataService: stubMetadataService(metadata, files),
      identityService: { getDepositor: () => Promise.reject(new Error('directory unavailable')) },
    });

    await expect(service.createPlaceholders(parameters, now)).rejects.toThrow('directory unavailable');
  });
});
