/**
 * Placeholder Mapper
 *
 * Derives the placeholder values of a deposit agreement from a dataset's
 * metadata and its depositor. Every extraction returns a partial map; use
 * mergePlaceholders() to combine them into a template context.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { Logger } from 'pino';
import {
  ACCESS_RIGHTS_TERM,
  AccessCategory,
  FileAccessRight,
  type AgreementParameters,
  type DatasetDates,
  type DatasetFile,
  type DatasetMetadata,
  type Depositor,
  type MetadataItem,
  type PlaceholderMap,
  type PlaceholderRow,
} from '../../types/agreement.js';
import { ResourceReadError, UnrecognizedCategoryError } from '../../types/errors.js';
import { IsoDate, formatCalendarDate, formatDateTime } from '../../utils/dateUtils.js';
import { createChildLogger } from '../../utils/logger.js';
import { MetadataTermLabels } from './MetadataTermLabels.js';
import { Placeholder } from './placeholders.js';

export const FOOTER_TEXT_FILE = 'FooterText.txt';
export const CHECKSUM_NOT_CALCULATED = 'not calculated';

const DATASET_ACCESS_LABELS = new Map<string, string>([
  [AccessCategory.ANONYMOUS_ACCESS, 'Anonymous'],
  [AccessCategory.OPEN_ACCESS, 'Open Access'],
  [AccessCategory.FREELY_AVAILABLE, 'Open Access'],
  [AccessCategory.OPEN_ACCESS_FOR_REGISTERED_USERS, 'Open access for registered users'],
  [AccessCategory.GROUP_ACCESS, "Restricted - 'archaeology' group"],
  [AccessCategory.REQUEST_PERMISSION, 'Restricted - request permission'],
  [AccessCategory.ACCESS_ELSEWHERE, 'Elsewhere'],
  [AccessCategory.NO_ACCESS, 'Other'],
]);

function isAccessRightsTerm(name: string, namespace: string): boolean {
  return name === ACCESS_RIGHTS_TERM.name && namespace === ACCESS_RIGHTS_TERM.namespace;
}

export class PlaceholderMapper {
  private readonly termLabels: MetadataTermLabels;
  private readonly log: Logger;

  /**
   * @param metadataTermsFile JSON resource with the metadata table terms and their labels
   * @param parameters settings of the current agreement request
   */
  constructor(
    metadataTermsFile: string,
    private readonly parameters: AgreementParameters
  ) {
    this.termLabels = MetadataTermLabels.load(metadataTermsFile);
    this.log = createChildLogger({ component: 'PlaceholderMapper', datasetId: parameters.datasetId });
  }

  header(metadata: DatasetMetadata): PlaceholderMap {
    const doi = metadata.getManagedDoi() ?? '';

    return {
      [Placeholder.IsSample]: this.parameters.isSample,
      [Placeholder.DansManagedDoi]: doi,
      [Placeholder.DansManagedEncodedDoi]: doi.replace(/\//g, '%2F'),
      [Placeholder.DateSubmitted]: this.dateSubmitted(metadata),
      [Placeholder.Title]: metadata.getPreferredTitle(),
    };
  }

  /**
   * Header for sample agreements. The dataset's DOI is never looked up.
   */
  sampleHeader(metadata: DatasetMetadata): PlaceholderMap {
    return {
      [Placeholder.IsSample]: true,
      [Placeholder.DateSubmitted]: this.dateSubmitted(metadata),
      [Placeholder.Title]: metadata.getPreferredTitle(),
    };
  }

  private dateSubmitted(metadata: DatasetMetadata): string {
    return (this.getDate(metadata, (dates) => dates.getSubmitted()) ?? new IsoDate()).toString();
  }

  /**
   * First date of the sequence picked by `selector`, if any
   */
  getDate(metadata: DatasetMetadata, selector: (dates: DatasetDates) => IsoDate[]): IsoDate | undefined {
    const [first] = selector(metadata.getDates());
    return first;
  }

  embargo(metadata: DatasetMetadata): PlaceholderMap {
    const available = this.getDate(metadata, (dates) => dates.getAvailable());

    if (!available) {
      return {
        [Placeholder.DateAvailable]: '',
        [Placeholder.UnderEmbargo]: false,
      };
    }

    if (available.isAfter(new IsoDate())) {
      return {
        [Placeholder.DateAvailable]: formatCalendarDate(available.toDate(), 'YYYY-MM-dd'),
        [Placeholder.UnderEmbargo]: true,
      };
    }

    return {
      [Placeholder.DateAvailable]: available.toString(),
      [Placeholder.UnderEmbargo]: false,
    };
  }

  depositor(depositor: Depositor): PlaceholderMap {
    return {
      [Placeholder.DepositorName]: depositor.name,
      [Placeholder.DepositorOrganisation]: depositor.organization,
      [Placeholder.DepositorAddress]: depositor.address,
      [Placeholder.DepositorPostalCode]: depositor.postalCode,
      [Placeholder.DepositorCity]: depositor.city,
      [Placeholder.DepositorCountry]: depositor.country,
      [Placeholder.DepositorTelephone]: depositor.telephone,
      [Placeholder.DepositorEmail]: depositor.email,
    };
  }

  /**
   * Whether the dataset is openly accessible. A dataset without an access
   * category counts as open.
   *
   * @throws UnrecognizedCategoryError for a value outside AccessCategory
   */
  isOpenAccess(metadata: DatasetMetadata): boolean {
    const category = metadata.getAccessCategory() ?? null;
    if (category === null) return true;

    switch (category) {
      case AccessCategory.OPEN_ACCESS:
      case AccessCategory.ANONYMOUS_ACCESS:
      case AccessCategory.FREELY_AVAILABLE:
        return true;
      case AccessCategory.OPEN_ACCESS_FOR_REGISTERED_USERS:
      case AccessCategory.GROUP_ACCESS:
      case AccessCategory.REQUEST_PERMISSION:
      case AccessCategory.ACCESS_ELSEWHERE:
      case AccessCategory.NO_ACCESS:
        return false;
      default: {
        const unhandled: never = category;
        throw new UnrecognizedCategoryError('AccessCategory', unhandled);
      }
    }
  }

  /**
   * Human readable access category. Text that is not a known category is
   * returned unchanged.
   */
  formatDatasetAccessRights(item: MetadataItem): string {
    const value = item.toString();
    return DATASET_ACCESS_LABELS.get(value) ?? value;
  }

  /**
   * @throws UnrecognizedCategoryError for a value outside FileAccessRight
   */
  formatFileAccessRights(right: FileAccessRight): string {
    switch (right) {
      case FileAccessRight.ANONYMOUS:
        return 'Anonymous';
      case FileAccessRight.KNOWN:
        return 'Known';
      case FileAccessRight.RESTRICTED_REQUEST:
        return 'Restricted request';
      case FileAccessRight.RESTRICTED_GROUP:
        return 'Restricted group';
      case FileAccessRight.NONE:
        return 'None';
      default: {
        const unhandled: never = right;
        throw new UnrecognizedCategoryError('FileAccessRight', unhandled);
      }
    }
  }

  accessRights(metadata: DatasetMetadata): PlaceholderMap {
    const [item] = metadata.getTerm(ACCESS_RIGHTS_TERM);

    return {
      [Placeholder.OpenAccess]: this.isOpenAccess(metadata),
      [Placeholder.DatasetAccessRights]: item ? this.formatDatasetAccessRights(item) : '',
    };
  }

  metadataTable(metadata: DatasetMetadata): PlaceholderMap {
    const rows: PlaceholderRow[] = [];

    for (const { name, namespace, label } of this.termLabels.terms) {
      const items = metadata.getTerm({ name, namespace });
      if (items.length === 0) continue;

      const values = isAccessRightsTerm(name, namespace)
        ? items.map((item) => this.formatDatasetAccessRights(item))
        : items.map((item) => item.toString());

      rows.push({
        [Placeholder.MetadataKey]: label,
        [Placeholder.MetadataValue]: values.join(', '),
      });
    }

    return { [Placeholder.MetadataTable]: rows };
  }

  fileTable(files: DatasetFile[]): PlaceholderMap {
    const rows = files.map((file): PlaceholderRow => ({
      [Placeholder.FilePath]: file.path,
      [Placeholder.FileChecksum]: file.checksum.trim() === '' ? CHECKSUM_NOT_CALCULATED : file.checksum,
      [Placeholder.FileAccessibleTo]: this.formatFileAccessRights(file.accessibleTo),
      [Placeholder.FileVisibleTo]: this.formatFileAccessRights(file.visibleTo),
    }));

    return {
      [Placeholder.HasFiles]: files.length > 0,
      [Placeholder.FileTable]: rows,
    };
  }

  footer(): PlaceholderMap {
    return {
      [Placeholder.FooterText]: this.footerText(join(this.parameters.templateResourceDir, FOOTER_TEXT_FILE)),
    };
  }

  generated(now: Date = new Date()): PlaceholderMap {
    return { [Placeholder.CurrentDateAndTime]: formatDateTime(now) };
  }

  /**
   * Content of a text file with its lines joined by '\n' and no trailing line break
   *
   * @throws ResourceReadError if the file cannot be read
   */
  footerText(file: string): string {
    let text: string;
    try {
      text = readFileSync(file, 'utf8');
    } catch (error) {
      throw new ResourceReadError(file, error);
    }

    const lines = text.split(/\r\n|\r|\n/);
    if (lines.length > 1 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    this.log.debug({ file, lines: lines.length }, 'Loaded footer text');
    return lines.join('\n');
  }
}
